import OpenAI from 'openai';
import pLimit from 'p-limit';
import { ScoringUnavailableError, describeError } from '../errors.js';
import { SENTIMENT_LABELS } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { ModelOutput, SentimentModel } from './sentimentModel.js';

export const DEFAULT_SENTIMENT_MODEL = 'gpt-4o-mini';
const DEFAULT_MAX_INPUT_TOKENS = 512;
const DEFAULT_CONCURRENCY = 8;
const TOP_LOGPROBS = 10;
// Stands in for a label the model left out of its top candidates.
const FLOOR_LOGPROB = -30;
const MIN_LABEL_PREFIX = 3;

const SYSTEM_PROMPT =
  'You are a sentiment classifier for short social posts and product reviews. Reply with exactly one lowercase word: negative, neutral, or positive.';

export interface OpenAiModelOptions {
  apiKey?: string | undefined;
  model?: string;
  maxInputTokens?: number;
  concurrency?: number;
  client?: OpenAI;
  logger?: Logger;
}

export interface TokenLogprob {
  token: string;
  logprob: number;
}

function logSumExp(values: readonly number[]): number {
  const max = Math.max(...values);
  return max + Math.log(values.reduce((sum, value) => sum + Math.exp(value - max), 0));
}

/**
 * Turns the first answer token's top log-probabilities into `[negative, neutral, positive]` logits.
 * Candidate tokens count toward a label when they are a prefix of it ("pos", " Positive").
 */
export function logitsFromTopLogprobs(candidates: readonly TokenLogprob[]): number[] {
  let matched = false;
  const logits = SENTIMENT_LABELS.map((label) => {
    const hits = candidates
      .filter((candidate) => {
        const token = candidate.token.trim().toLowerCase();
        return token.length >= MIN_LABEL_PREFIX && label.startsWith(token);
      })
      .map((candidate) => candidate.logprob);
    if (hits.length === 0) {
      return FLOOR_LOGPROB;
    }
    matched = true;
    return logSumExp(hits);
  });

  if (!matched) {
    const seen = candidates.map((candidate) => JSON.stringify(candidate.token)).join(', ');
    throw new Error(`Model answer did not contain a sentiment label (saw ${seen || 'no tokens'})`);
  }
  return logits;
}

class OpenAiSentimentModel implements SentimentModel {
  readonly id: string;
  readonly maxInputTokens: number;
  private readonly concurrency: number;

  constructor(private readonly client: OpenAI, private readonly model: string, options: OpenAiModelOptions) {
    this.id = `openai:${model}`;
    this.maxInputTokens = options.maxInputTokens ?? DEFAULT_MAX_INPUT_TOKENS;
    this.concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  }

  async classifyBatch(texts: readonly string[]): Promise<ModelOutput[]> {
    const limit = pLimit(this.concurrency);
    const settled = await Promise.allSettled(texts.map((text) => limit(() => this.classify(text))));
    return settled.map((result) =>
      result.status === 'fulfilled'
        ? result.value
        : result.reason instanceof Error
          ? result.reason
          : new Error(describeError(result.reason)),
    );
  }

  private async classify(text: string): Promise<number[]> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      temperature: 0,
      max_completion_tokens: 1,
      logprobs: true,
      top_logprobs: TOP_LOGPROBS,
      messages: [
        { role: 'system', content: SYSTEM_PROMPT },
        { role: 'user', content: text },
      ],
    });

    const first = response.choices[0]?.logprobs?.content?.[0];
    if (!first) {
      throw new Error('OpenAI response did not include token log-probabilities.');
    }
    return logitsFromTopLogprobs(first.top_logprobs);
  }
}

/**
 * Resolves the OpenAI-backed classifier: the key must be present and the model retrievable.
 * Both failures surface as `ScoringUnavailableError`.
 */
export async function loadOpenAiModel(options: OpenAiModelOptions = {}): Promise<SentimentModel> {
  const model = options.model ?? DEFAULT_SENTIMENT_MODEL;
  let client = options.client;
  if (!client) {
    if (!options.apiKey) {
      throw new ScoringUnavailableError('OPENAI_API_KEY is missing from the environment.');
    }
    client = new OpenAI({ apiKey: options.apiKey });
  }

  try {
    await client.models.retrieve(model);
  } catch (error) {
    throw new ScoringUnavailableError(`Model ${model} could not be loaded: ${describeError(error)}`, { cause: error });
  }

  options.logger?.(`Using ${model} for transformer scoring`);
  return new OpenAiSentimentModel(client, model, options);
}
