import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { clean } from '../analysis/preprocessor.js';
import { reconcile } from '../analysis/reconciler.js';
import { UnifiedDataset } from '../pipeline/dataset.js';
import { toJsonRow, writeJsonRows } from './writer.js';

function sampleDataset(): UnifiedDataset {
  const dataset = new UnifiedDataset();
  dataset.append(
    { id: 'r1', platform: 'reddit', text: 'Great kettle', timestamp: new Date('2024-03-01T00:00:00.000Z'), author: 'Asha' },
    clean('Great kettle'),
    reconcile({
      recordId: 'r1',
      platform: 'reddit',
      lexicon: { compound: 0.6, pos: 0.6, neu: 0.4, neg: 0, label: 'positive' },
      transformer: { label: 'positive', confidence: 0.8, distribution: { negative: 0.1, neutral: 0.1, positive: 0.8 } },
    }),
  );
  dataset.append(
    { id: 'r2', platform: 'uploaded', text: 'It is a kettle' },
    clean('It is a kettle'),
    reconcile({
      recordId: 'r2',
      platform: 'uploaded',
      lexicon: { compound: 0, pos: 0, neu: 1, neg: 0, label: 'neutral' },
    }),
  );
  return dataset;
}

describe('toJsonRow', () => {
  it('keeps typed values and uses null for missing fields', () => {
    const [withTransformer, lexiconOnly] = sampleDataset().rows.map(toJsonRow);

    expect(withTransformer).toMatchObject({
      record_id: 'r1',
      timestamp: '2024-03-01T00:00:00.000Z',
      author: 'Asha',
      engagement: null,
      transformer_label: 'positive',
      transformer_confidence: 0.8,
      final_label: 'positive',
      agreement: true,
    });
    expect(withTransformer?.final_confidence).toBeCloseTo(0.7, 12);
    expect(lexiconOnly).toEqual({
      record_id: 'r2',
      platform: 'uploaded',
      timestamp: null,
      author: null,
      engagement: null,
      text: 'It is a kettle',
      normalized_text: 'It is a kettle',
      lexicon_compound: 0,
      lexicon_label: 'neutral',
      transformer_label: null,
      transformer_confidence: null,
      final_label: 'neutral',
      final_confidence: 0,
      score: 0,
      agreement: false,
    });
  });
});

describe('writeJsonRows', () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('writes every row as one JSON array', async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'json-writer-'));
    const destination = path.join(dir, 'nested', 'out.json');

    const written = await writeJsonRows(destination, sampleDataset());
    const parsed: unknown = JSON.parse(await readFile(destination, 'utf8'));

    expect(written).toBe(2);
    expect(Array.isArray(parsed)).toBe(true);
    expect(parsed).toHaveLength(2);
    expect(parsed).toEqual(sampleDataset().rows.map(toJsonRow));
  });
});
