import { describe, expect, it } from 'vitest';
import { ContractViolationError } from '../errors.js';
import type { LexiconScore, TransformerScore } from '../types/index.js';
import { reconcile } from './reconciler.js';

const positiveLexicon: LexiconScore = { compound: 0.6, pos: 0.5, neu: 0.5, neg: 0, label: 'positive' };
const positiveTransformer: TransformerScore = {
  label: 'positive',
  confidence: 0.8,
  distribution: { negative: 0.1, neutral: 0.1, positive: 0.8 },
};
const negativeTransformer: TransformerScore = {
  label: 'negative',
  confidence: 0.8,
  distribution: { negative: 0.8, neutral: 0.1, positive: 0.1 },
};

describe('reconcile', () => {
  it('averages confidences when both scorers agree', () => {
    const result = reconcile({ recordId: 'r1', platform: 'reddit', lexicon: positiveLexicon, transformer: positiveTransformer });

    expect(result.finalLabel).toBe('positive');
    expect(result.finalConfidence).toBeCloseTo(0.7, 12);
    expect(result.score).toBeCloseTo(0.67, 12);
    expect(result.agreement).toBe(true);
  });

  it('lets the transformer win at a discount when the scorers disagree', () => {
    const result = reconcile({ recordId: 'r2', platform: 'reddit', lexicon: positiveLexicon, transformer: negativeTransformer });

    expect(result.finalLabel).toBe('negative');
    expect(result.finalConfidence).toBeCloseTo(0.6, 12);
    expect(result.score).toBeCloseTo(-0.31, 12);
    expect(result.agreement).toBe(false);
  });

  it('honours a custom discount', () => {
    const result = reconcile(
      { recordId: 'r2', platform: 'reddit', lexicon: positiveLexicon, transformer: negativeTransformer },
      0.5,
    );
    expect(result.finalConfidence).toBeCloseTo(0.4, 12);
  });

  it('keeps the lexicon verdict without a transformer score', () => {
    const result = reconcile({ recordId: 'r3', platform: 'uploaded', lexicon: positiveLexicon });

    expect(result).toEqual({
      recordId: 'r3',
      platform: 'uploaded',
      lexicon: positiveLexicon,
      finalLabel: 'positive',
      finalConfidence: 0.6,
      score: 0.6,
      agreement: false,
    });
    expect(result.transformer).toBeUndefined();
  });

  it('returns frozen results', () => {
    const result = reconcile({ recordId: 'r1', platform: 'reddit', lexicon: positiveLexicon, transformer: positiveTransformer });

    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.lexicon)).toBe(true);
    expect(Object.isFrozen(result.transformer?.distribution)).toBe(true);
  });

  it('rejects scores outside their declared ranges', () => {
    expect(() =>
      reconcile({ recordId: 'x', platform: 'reddit', lexicon: { ...positiveLexicon, compound: 1.2 } }),
    ).toThrow(ContractViolationError);
    expect(() =>
      reconcile({ recordId: 'x', platform: 'reddit', lexicon: { ...positiveLexicon, neu: 0.4 } }),
    ).toThrow(ContractViolationError);
    expect(() =>
      reconcile({
        recordId: 'x',
        platform: 'reddit',
        lexicon: positiveLexicon,
        transformer: { ...positiveTransformer, distribution: { negative: 0.1, neutral: 0.1, positive: 0.7 } },
      }),
    ).toThrow(ContractViolationError);
    expect(() =>
      reconcile({ recordId: 'x', platform: 'reddit', lexicon: positiveLexicon, transformer: { ...positiveTransformer, confidence: 1.5 } }),
    ).toThrow(ContractViolationError);
  });

  it('rejects a discount outside (0, 1)', () => {
    expect(() => reconcile({ recordId: 'x', platform: 'reddit', lexicon: positiveLexicon }, 1)).toThrow(
      ContractViolationError,
    );
    expect(() => reconcile({ recordId: 'x', platform: 'reddit', lexicon: positiveLexicon }, 0)).toThrow(
      ContractViolationError,
    );
  });
});
