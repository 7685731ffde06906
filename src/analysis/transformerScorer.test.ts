import * as fc from 'fast-check';
import { describe, expect, it } from 'vitest';
import { MemoryCache } from '../cache/memoryCache.js';
import { clean } from './preprocessor.js';
import { ScoreCache } from './scoreCache.js';
import type { ModelOutput, SentimentModel } from './sentimentModel.js';
import { EMPTY_TEXT_SCORE, TransformerScorer, argmaxLabel, scoreFromLogits, softmax } from './transformerScorer.js';

function keywordLogits(text: string): number[] {
  if (text.includes('great')) {
    return [0, 0, Math.log(4)];
  }
  if (text.includes('awful')) {
    return [Math.log(4), 0, 0];
  }
  return [0, Math.log(4), 0];
}

class FakeModel implements SentimentModel {
  readonly id = 'fake:v1';
  readonly calls: string[][] = [];

  constructor(
    readonly maxInputTokens: number = 512,
    private readonly logitsFor: (text: string) => number[] = keywordLogits,
  ) {}

  async classifyBatch(texts: readonly string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map((text) => this.logitsFor(text));
  }
}

describe('softmax', () => {
  it('turns equal logits into a uniform distribution', () => {
    const [a, b, c] = softmax([0, 0, 0]);
    expect(a).toBeCloseTo(1 / 3, 12);
    expect(b).toBeCloseTo(1 / 3, 12);
    expect(c).toBeCloseTo(1 / 3, 12);
  });

  it('stays finite for large logits', () => {
    const [a, b, c] = softmax([1000, 1000, 0]);
    expect(a).toBeCloseTo(0.5, 12);
    expect(b).toBeCloseTo(0.5, 12);
    expect(c).toBeCloseTo(0, 12);
  });
});

describe('argmaxLabel', () => {
  it('resolves a tie with neutral to neutral', () => {
    expect(argmaxLabel({ negative: 0.4, neutral: 0.4, positive: 0.2 })).toBe('neutral');
    expect(argmaxLabel({ negative: 0.2, neutral: 0.4, positive: 0.4 })).toBe('neutral');
  });

  it('picks the strict maximum', () => {
    expect(argmaxLabel({ negative: 0.1, neutral: 0.2, positive: 0.7 })).toBe('positive');
  });
});

describe('scoreFromLogits', () => {
  it('reports the probability of the winning label as confidence', () => {
    const result = scoreFromLogits([0, 0, Math.log(2)]);

    expect(result.label).toBe('positive');
    expect(result.confidence).toBeCloseTo(0.5, 12);
    expect(result.distribution.negative).toBeCloseTo(0.25, 12);
    expect(result.distribution.neutral).toBeCloseTo(0.25, 12);
  });

  it('yields a distribution summing to one whose argmax is the label', () => {
    const logit = fc.double({ min: -50, max: 50, noNaN: true });
    fc.assert(
      fc.property(fc.tuple(logit, logit, logit), (logits) => {
        const { label, confidence, distribution } = scoreFromLogits(logits);

        expect(distribution.negative + distribution.neutral + distribution.positive).toBeCloseTo(1, 9);
        expect(confidence).toBe(distribution[label]);
        expect(confidence).toBe(Math.max(distribution.negative, distribution.neutral, distribution.positive));
      }),
      { numRuns: 300 },
    );
  });

  it('rejects vectors of the wrong shape', () => {
    expect(() => scoreFromLogits([1, 2])).toThrow('Expected 3 finite logits, received [1, 2]');
    expect(() => scoreFromLogits([1, Number.NaN, 2])).toThrow(/finite logits/);
  });
});

describe('TransformerScorer', () => {
  it('sends one model call per batch and skips empty texts', async () => {
    const model = new FakeModel();
    const scorer = new TransformerScorer(model);

    const { scores, failures } = await scorer.scoreBatch([clean('great stuff'), clean(' '), clean('awful stuff')]);

    const [great, empty, awful] = scores;
    expect(model.calls).toEqual([['great stuff', 'awful stuff']]);
    expect(failures).toEqual([]);
    expect(great?.label).toBe('positive');
    expect(great?.confidence).toBeCloseTo(4 / 6, 12);
    expect(empty).toBe(EMPTY_TEXT_SCORE);
    expect(awful?.label).toBe('negative');
  });

  it('truncates inputs to the model window', async () => {
    const model = new FakeModel(2);
    const scorer = new TransformerScorer(model, { maxInputTokens: 100 });

    await scorer.score(clean('abcdefghijkl'));

    expect(model.calls).toEqual([['abcdefgh']]);
  });

  it('reuses cached logits for the same model and text', async () => {
    const memory = new MemoryCache();
    const first = new FakeModel();
    const second = new FakeModel();

    const before = await new TransformerScorer(first, { cache: new ScoreCache(memory) }).score(clean('great'));
    const after = await new TransformerScorer(second, { cache: new ScoreCache(memory) }).score(clean('great'));

    expect(second.calls).toEqual([]);
    expect(after).toEqual(before);
    expect(memory.size).toBe(1);
  });

  it('refuses batches larger than its batch size', async () => {
    const scorer = new TransformerScorer(new FakeModel(), { batchSize: 2 });

    await expect(scorer.scoreBatch([clean('a'), clean('b'), clean('c')])).rejects.toThrow(RangeError);
  });

  it('fails when the model answers with the wrong number of vectors', async () => {
    const model: SentimentModel = { id: 'fake:short', maxInputTokens: 512, classifyBatch: async () => [] };

    await expect(new TransformerScorer(model).score(clean('great'))).rejects.toThrow(
      'Sentiment model returned 0 results for 1 inputs',
    );
  });

  it('does not cache malformed logits', async () => {
    const memory = new MemoryCache();
    const scorer = new TransformerScorer(new FakeModel(512, () => [1, 2]), { cache: new ScoreCache(memory) });

    await expect(scorer.score(clean('great'))).rejects.toThrow(/finite logits/);
    expect(memory.size).toBe(0);
  });

  it('fails only the text the model could not classify', async () => {
    const memory = new MemoryCache();
    const model: SentimentModel = {
      id: 'fake:partial',
      maxInputTokens: 512,
      classifyBatch: async (texts): Promise<ModelOutput[]> =>
        texts.map((text) => (text === 'odd one' ? new Error('no label in answer') : keywordLogits(text))),
    };
    const scorer = new TransformerScorer(model, { cache: new ScoreCache(memory) });

    const { scores, failures } = await scorer.scoreBatch([clean('great'), clean('odd one'), clean('awful')]);

    expect(scores.map((score) => score?.label)).toEqual(['positive', undefined, 'negative']);
    expect(failures).toEqual([{ index: 1, error: new Error('no label in answer') }]);
    expect(memory.size).toBe(2);
    await expect(scorer.score(clean('odd one'))).rejects.toThrow('no label in answer');
  });
});
