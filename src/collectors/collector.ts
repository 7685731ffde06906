import { CollectionError, describeError } from '../errors.js';
import { parseJson, type JotSchema } from '../jot.js';
import type { OnlinePlatform, Platform, RawRecord, RecordMetadata } from '../types/index.js';

export interface CollectOptions {
  signal?: AbortSignal;
}

/**
 * One platform's fetch capability. `fetch` returns a lazy, finite sequence that re-runs its I/O
 * on every call and yields at most `limit` records.
 */
export interface Collector {
  readonly platform: OnlinePlatform;
  fetch(query: string, limit: number, options?: CollectOptions): AsyncIterable<RawRecord>;
}

export interface RecordFields {
  id: string;
  platform: Platform;
  text: string | undefined;
  timestamp?: Date | undefined;
  author?: string | undefined;
  engagement?: number | undefined;
  metadata?: RecordMetadata | undefined;
}

/** Builds a record, or returns null when there is no text to analyze. */
export function toRawRecord(fields: RecordFields): RawRecord | null {
  const text = fields.text?.trim();
  if (!text || !fields.id) {
    return null;
  }

  return {
    id: fields.id,
    platform: fields.platform,
    text,
    ...(fields.timestamp && !Number.isNaN(fields.timestamp.getTime()) ? { timestamp: fields.timestamp } : {}),
    ...(fields.author ? { author: fields.author } : {}),
    ...(fields.engagement !== undefined && Number.isFinite(fields.engagement) ? { engagement: fields.engagement } : {}),
    ...(fields.metadata && Object.keys(fields.metadata).length > 0 ? { metadata: fields.metadata } : {}),
  };
}

export function assertLimit(limit: number): void {
  if (!Number.isInteger(limit) || limit <= 0) {
    throw new RangeError(`limit must be a positive integer, received ${limit}`);
  }
}

/** Drops undefined values so the metadata map stays flat. */
export function compactMetadata(entries: Record<string, string | number | undefined>): RecordMetadata {
  const metadata: RecordMetadata = {};
  for (const [key, value] of Object.entries(entries)) {
    if (value !== undefined && value !== '') {
      metadata[key] = value;
    }
  }
  return metadata;
}

export async function readPayload<T>(
  response: Response,
  schema: JotSchema<T>,
  platform: OnlinePlatform,
  name: string,
): Promise<T> {
  try {
    return parseJson(await response.text(), schema, name);
  } catch (error) {
    throw new CollectionError(platform, `Unreadable ${name} response: ${describeError(error)}`, { cause: error });
  }
}
