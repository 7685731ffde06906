/** A stored payload, addressed by the checksum of whatever produced it. */
export interface CacheEntry {
  readonly checksum: string;
  /** ISO time of the write. */
  readonly storedAt: string;
  /** Context kept beside the body for inspection, such as the model id behind cached logits. */
  readonly metadata?: Readonly<Record<string, unknown>>;
  readonly body: string;
}

/** Clients stamp `storedAt` themselves. */
export type CacheWriteInput = Omit<CacheEntry, 'storedAt'>;

/**
 * Namespaced key-value store for results that are expensive to recompute. A miss resolves to
 * null; only I/O failures reject.
 */
export interface CacheClient {
  read(namespace: string, checksum: string): Promise<CacheEntry | null>;
  write(namespace: string, entry: CacheWriteInput): Promise<void>;
}
