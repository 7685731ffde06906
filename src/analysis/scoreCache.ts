import type { CacheClient } from '../cache/cache.js';
import { jot, parseJson } from '../jot.js';
import { checksumFrom } from '../utils/hash.js';

const logitsNode = jot.array(jot.number());

/** Model logits keyed by model snapshot and input text. */
export class ScoreCache {
  constructor(private readonly cache: CacheClient, private readonly namespace: string = 'transformer-logits') {}

  async read(modelId: string, text: string): Promise<number[] | null> {
    const cached = await this.cache.read(this.namespace, this.checksum(modelId, text));
    if (!cached) {
      return null;
    }
    return parseJson(cached.body, logitsNode, 'cached logits');
  }

  async write(modelId: string, text: string, logits: readonly number[]): Promise<void> {
    await this.cache.write(this.namespace, {
      checksum: this.checksum(modelId, text),
      body: JSON.stringify(logits),
      metadata: { modelId, characters: text.length },
    });
  }

  private checksum(modelId: string, text: string): string {
    return checksumFrom({ type: 'transformer-logits', version: 1, modelId, text });
  }
}
