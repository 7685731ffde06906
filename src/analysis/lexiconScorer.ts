import vader, { type PolarityScores } from 'vader-sentiment';
import { ContractViolationError } from '../errors.js';
import type { CleanText, LexiconScore, SentimentLabel } from '../types/index.js';

export const POSITIVE_THRESHOLD = 0.05;
export const NEGATIVE_THRESHOLD = -0.05;

export type PolarityFunction = (text: string) => PolarityScores;

export interface LexiconScorerOptions {
  /** Replaces the VADER analyzer. */
  polarity?: PolarityFunction;
}

const NEUTRAL_SCORE: Readonly<LexiconScore> = Object.freeze<LexiconScore>({
  compound: 0,
  pos: 0,
  neu: 1,
  neg: 0,
  label: 'neutral',
});

export function labelFromCompound(compound: number): SentimentLabel {
  if (compound >= POSITIVE_THRESHOLD) {
    return 'positive';
  }
  if (compound <= NEGATIVE_THRESHOLD) {
    return 'negative';
  }
  return 'neutral';
}

/**
 * Rule-based polarity scorer backed by the VADER lexicon and its rules for negation, boosters,
 * contrastive "but", capitalization and punctuation emphasis.
 */
export class LexiconScorer {
  private readonly polarity: PolarityFunction;

  constructor(options: LexiconScorerOptions = {}) {
    this.polarity = options.polarity ?? ((text) => vader.SentimentIntensityAnalyzer.polarity_scores(text));
  }

  score(text: CleanText): LexiconScore {
    if (!text.normalized) {
      return { ...NEUTRAL_SCORE };
    }

    // Case is kept: VADER weighs all-caps words.
    const raw = this.polarity(text.normalized);
    if (![raw.compound, raw.pos, raw.neu, raw.neg].every(Number.isFinite) || Math.abs(raw.compound) > 1) {
      throw new ContractViolationError(`Lexicon analyzer returned an out-of-range score for "${text.normalized}"`);
    }

    // VADER rounds its proportions, so they are rescaled to sum to exactly one.
    const total = raw.pos + raw.neu + raw.neg;
    const { pos, neu, neg } =
      total > 0 ? { pos: raw.pos / total, neu: raw.neu / total, neg: raw.neg / total } : NEUTRAL_SCORE;

    return { compound: raw.compound, pos, neu, neg, label: labelFromCompound(raw.compound) };
  }
}
