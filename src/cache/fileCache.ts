import { promises as fs } from 'node:fs';
import path from 'node:path';
import { jot, parseJson } from '../jot.js';
import type { CacheClient, CacheEntry, CacheWriteInput } from './cache.js';

const metadataNode = jot.object({
  storedAt: jot.string(),
  metadata: jot.optional(jot.record(jot.unknown())),
});

export interface FileCacheOptions {
  baseDir?: string;
}

/** One `<checksum>.body` plus `<checksum>.meta.json` pair per entry, grouped by namespace directory. */
export class FileCache implements CacheClient {
  private readonly baseDir: string;

  constructor(options: FileCacheOptions = {}) {
    this.baseDir = options.baseDir ?? '.cache';
  }

  async read(namespace: string, checksum: string): Promise<CacheEntry | null> {
    const { bodyPath, metaPath } = this.paths(namespace, checksum);

    let body: string;
    let metaRaw: string;
    try {
      [body, metaRaw] = await Promise.all([fs.readFile(bodyPath, 'utf8'), fs.readFile(metaPath, 'utf8')]);
    } catch (error) {
      if (isMissingFile(error)) {
        return null;
      }
      throw error;
    }

    const meta = parseJson(metaRaw, metadataNode, metaPath);
    return {
      checksum,
      body,
      storedAt: meta.storedAt,
      ...(meta.metadata ? { metadata: meta.metadata } : {}),
    };
  }

  async write(namespace: string, entry: CacheWriteInput): Promise<void> {
    const { dir, bodyPath, metaPath } = this.paths(namespace, entry.checksum);
    await fs.mkdir(dir, { recursive: true });

    const metadata = {
      storedAt: new Date().toISOString(),
      ...(entry.metadata ? { metadata: entry.metadata } : {}),
    };

    await Promise.all([
      fs.writeFile(bodyPath, entry.body, 'utf8'),
      fs.writeFile(metaPath, JSON.stringify(metadata, null, 2), 'utf8'),
    ]);
  }

  private paths(namespace: string, checksum: string) {
    const dir = path.join(this.baseDir, namespace);
    return {
      dir,
      bodyPath: path.join(dir, `${checksum}.body`),
      metaPath: path.join(dir, `${checksum}.meta.json`),
    };
  }
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
