import type { CleanText, LabelDistribution, SentimentLabel, TransformerScore } from '../types/index.js';
import { SENTIMENT_LABELS } from '../types/index.js';
import { truncateToTokens } from '../utils/text.js';
import type { Logger } from '../utils/logger.js';
import type { ModelOutput, SentimentModel } from './sentimentModel.js';
import type { ScoreCache } from './scoreCache.js';

const DEFAULT_BATCH_SIZE = 16;

export interface ItemFailure {
  /** Position of the text in the batch. */
  index: number;
  error: Error;
}

export interface ScoredBatch {
  scores: Array<TransformerScore | undefined>;
  failures: ItemFailure[];
}

export interface TransformerScorerOptions {
  cache?: ScoreCache;
  batchSize?: number;
  /** Overrides the model's own window when smaller. */
  maxInputTokens?: number;
  logger?: Logger;
}

export function softmax(logits: readonly number[]): number[] {
  const max = Math.max(...logits);
  const exps = logits.map((value) => Math.exp(value - max));
  const total = exps.reduce((sum, value) => sum + value, 0);
  return exps.map((value) => value / total);
}

/** Highest-probability label; a tie that includes neutral resolves to neutral. */
export function argmaxLabel(distribution: LabelDistribution): SentimentLabel {
  let best: SentimentLabel = 'neutral';
  for (const label of SENTIMENT_LABELS) {
    if (distribution[label] > distribution[best]) {
      best = label;
    }
  }
  return best;
}

export function scoreFromLogits(logits: readonly number[]): TransformerScore {
  if (logits.length !== SENTIMENT_LABELS.length || logits.some((value) => !Number.isFinite(value))) {
    throw new Error(`Expected ${SENTIMENT_LABELS.length} finite logits, received [${logits.join(', ')}]`);
  }

  const [negative = 0, neutral = 0, positive = 0] = softmax(logits);
  const distribution: LabelDistribution = { negative, neutral, positive };
  const label = argmaxLabel(distribution);
  return { label, confidence: distribution[label], distribution };
}

export const EMPTY_TEXT_SCORE: Readonly<TransformerScore> = Object.freeze<TransformerScore>({
  label: 'neutral',
  confidence: 0,
  distribution: Object.freeze({ negative: 1 / 3, neutral: 1 / 3, positive: 1 / 3 }),
});

/**
 * Scores cleaned text with a pre-trained classifier. Inputs are truncated to the model window,
 * logits are rescaled with softmax, and each batch is one model invocation.
 */
export class TransformerScorer {
  readonly batchSize: number;
  private readonly maxInputTokens: number;
  private readonly cache: ScoreCache | undefined;
  private readonly logger: Logger | undefined;

  constructor(private readonly model: SentimentModel, options: TransformerScorerOptions = {}) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.maxInputTokens = Math.min(options.maxInputTokens ?? model.maxInputTokens, model.maxInputTokens);
    this.cache = options.cache;
    this.logger = options.logger;
    if (this.batchSize <= 0) {
      throw new RangeError('batchSize must be greater than 0');
    }
  }

  get modelId(): string {
    return this.model.id;
  }

  async score(text: CleanText): Promise<TransformerScore> {
    const { scores, failures } = await this.scoreBatch([text]);
    const [failure] = failures;
    if (failure) {
      throw failure.error;
    }
    const [result] = scores;
    if (!result) {
      throw new Error('Sentiment model returned no score for the input.');
    }
    return result;
  }

  /**
   * Scores up to `batchSize` texts; `scores` keeps the input order. A text the model could not
   * classify is left undefined and listed in `failures` without affecting the rest of the batch.
   */
  async scoreBatch(texts: readonly CleanText[]): Promise<ScoredBatch> {
    if (texts.length > this.batchSize) {
      throw new RangeError(`Batch of ${texts.length} exceeds batchSize ${this.batchSize}`);
    }

    const inputs = texts.map((text) => truncateToTokens(text.normalized, this.maxInputTokens));
    const cached = await Promise.all(
      inputs.map((input) => (input && this.cache ? this.cache.read(this.model.id, input) : Promise.resolve(null))),
    );
    const scores: Array<TransformerScore | undefined> = inputs.map((input, index) => {
      const vector = cached[index];
      return input && vector ? scoreFromLogits(vector) : EMPTY_TEXT_SCORE;
    });
    const failures: ItemFailure[] = [];

    const missing = inputs.flatMap((input, index) => (input && !cached[index] ? [index] : []));
    if (missing.length === 0) {
      return { scores, failures };
    }

    const fresh = await this.model.classifyBatch(missing.map((index) => inputs[index] ?? ''));
    if (fresh.length !== missing.length) {
      throw new Error(`Sentiment model returned ${fresh.length} results for ${missing.length} inputs`);
    }
    await Promise.all(
      missing.map(async (inputIndex, freshIndex) => {
        const scored = scoreOutput(fresh[freshIndex] ?? []);
        if (scored instanceof Error) {
          scores[inputIndex] = undefined;
          failures.push({ index: inputIndex, error: scored });
          return;
        }
        scores[inputIndex] = scored.score;
        await this.cache?.write(this.model.id, inputs[inputIndex] ?? '', scored.logits);
      }),
    );
    failures.sort((a, b) => a.index - b.index);
    this.logger?.(
      `Scored ${missing.length - failures.length}/${texts.length} texts with ${this.model.id}` +
        (failures.length > 0 ? `, ${failures.length} failed` : ''),
    );
    return { scores, failures };
  }
}

function scoreOutput(output: ModelOutput): { score: TransformerScore; logits: number[] } | Error {
  if (output instanceof Error) {
    return output;
  }
  try {
    return { score: scoreFromLogits(output), logits: output };
  } catch (error) {
    return error instanceof Error ? error : new Error(String(error));
  }
}
