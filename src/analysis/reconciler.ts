import { ContractViolationError } from '../errors.js';
import type { LexiconScore, Platform, ReconciledResult, TransformerScore } from '../types/index.js';
import { SENTIMENT_LABELS } from '../types/index.js';

export const DEFAULT_DISAGREEMENT_DISCOUNT = 0.75;
const LEXICON_WEIGHT = 0.3;
const TRANSFORMER_WEIGHT = 0.7;
const TOLERANCE = 1e-6;

export interface ReconcileInput {
  recordId: string;
  platform: Platform;
  lexicon: LexiconScore;
  transformer?: TransformerScore | undefined;
}

function inUnitRange(value: number): boolean {
  return Number.isFinite(value) && value >= -TOLERANCE && value <= 1 + TOLERANCE;
}

function assertLexicon(score: LexiconScore): void {
  const { compound, pos, neu, neg } = score;
  if (!Number.isFinite(compound) || compound < -1 || compound > 1) {
    throw new ContractViolationError(`Lexicon compound ${compound} is outside [-1, 1]`);
  }
  if (![pos, neu, neg].every(inUnitRange) || Math.abs(pos + neu + neg - 1) > TOLERANCE) {
    throw new ContractViolationError(`Lexicon proportions ${pos}/${neu}/${neg} do not form a distribution`);
  }
}

function assertTransformer(score: TransformerScore): void {
  const values = SENTIMENT_LABELS.map((label) => score.distribution[label]);
  const total = values.reduce((sum, value) => sum + value, 0);
  if (!values.every(inUnitRange) || Math.abs(total - 1) > TOLERANCE) {
    throw new ContractViolationError(`Transformer distribution sums to ${total}`);
  }
  if (!inUnitRange(score.confidence)) {
    throw new ContractViolationError(`Transformer confidence ${score.confidence} is outside [0, 1]`);
  }
}

/**
 * Merges the two scorer outputs into one frozen verdict. Agreement averages both confidences;
 * on disagreement the transformer label wins at a discounted confidence. Without a transformer
 * score the lexicon verdict stands and `agreement` is false.
 */
export function reconcile(
  input: ReconcileInput,
  discount: number = DEFAULT_DISAGREEMENT_DISCOUNT,
): ReconciledResult {
  if (!(discount > 0 && discount < 1)) {
    throw new ContractViolationError(`Disagreement discount ${discount} must lie strictly between 0 and 1`);
  }

  const { lexicon, transformer } = input;
  assertLexicon(lexicon);
  const lexiconConfidence = Math.abs(lexicon.compound);

  if (!transformer) {
    return Object.freeze({
      recordId: input.recordId,
      platform: input.platform,
      lexicon: Object.freeze({ ...lexicon }),
      finalLabel: lexicon.label,
      finalConfidence: lexiconConfidence,
      score: lexicon.compound,
      agreement: false,
    });
  }

  assertTransformer(transformer);
  const agreement = lexicon.label === transformer.label;
  const finalConfidence = agreement
    ? (transformer.confidence + lexiconConfidence) / 2
    : transformer.confidence * discount;
  const transformerPolarity = transformer.distribution.positive - transformer.distribution.negative;

  return Object.freeze({
    recordId: input.recordId,
    platform: input.platform,
    lexicon: Object.freeze({ ...lexicon }),
    transformer: Object.freeze({ ...transformer, distribution: Object.freeze({ ...transformer.distribution }) }),
    finalLabel: transformer.label,
    finalConfidence,
    score: LEXICON_WEIGHT * lexicon.compound + TRANSFORMER_WEIGHT * transformerPolarity,
    agreement,
  });
}
