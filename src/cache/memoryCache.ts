import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

/** Process-local cache for runs that should leave nothing on disk. */
export class MemoryCache implements CacheClient {
  private readonly entries = new Map<string, CacheEntry>();

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    return this.entries.get(`${namespace}/${checksum}`) ?? null;
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    this.entries.set(`${namespace}/${entry.checksum}`, {
      checksum: entry.checksum,
      body: entry.body,
      storedAt: new Date().toISOString(),
      ...(entry.metadata ? { metadata: entry.metadata } : {}),
    });
  }

  get size(): number {
    return this.entries.size;
  }
}
