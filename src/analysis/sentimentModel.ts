import { ScoringUnavailableError, describeError } from '../errors.js';
import type { Logger } from '../utils/logger.js';

/** Logits for one text, or the reason that text could not be classified. */
export type ModelOutput = number[] | Error;

/**
 * A fixed, pre-trained three-class classifier. Each returned logit vector is ordered
 * `[negative, neutral, positive]` and lines up with the input at the same index. A rejected
 * promise fails the whole batch; an `Error` entry fails only its own text.
 */
export interface SentimentModel {
  readonly id: string;
  readonly maxInputTokens: number;
  classifyBatch(texts: readonly string[]): Promise<ModelOutput[]>;
}

export type ModelLoader = () => Promise<SentimentModel>;

/**
 * Loads the model at most once per process and hands every caller the same instance. A failed
 * load is remembered too, so a run degrades once instead of retrying per record.
 */
export class ModelHandle {
  private pending: Promise<SentimentModel> | undefined;

  constructor(private readonly loader: ModelLoader, private readonly logger?: Logger) {}

  load(): Promise<SentimentModel> {
    this.pending ??= this.loadOnce();
    return this.pending;
  }

  private async loadOnce(): Promise<SentimentModel> {
    try {
      const model = await this.loader();
      this.logger?.(`Loaded sentiment model ${model.id}`);
      return model;
    } catch (error) {
      if (error instanceof ScoringUnavailableError) {
        throw error;
      }
      throw new ScoringUnavailableError(`Sentiment model failed to load: ${describeError(error)}`, { cause: error });
    }
  }
}
