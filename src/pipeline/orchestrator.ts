import { clean } from '../analysis/preprocessor.js';
import { LexiconScorer } from '../analysis/lexiconScorer.js';
import { DEFAULT_DISAGREEMENT_DISCOUNT, reconcile } from '../analysis/reconciler.js';
import type { ScoreCache } from '../analysis/scoreCache.js';
import type { ModelHandle } from '../analysis/sentimentModel.js';
import { TransformerScorer } from '../analysis/transformerScorer.js';
import { collectorFactory, type Collector, type CollectorFactory, type CollectorSettings } from '../collectors/index.js';
import { ConfigurationError, ScoringUnavailableError, describeError } from '../errors.js';
import type {
  CleanText,
  LexiconScore,
  OnlinePlatform,
  PlatformOutcome,
  RawRecord,
  RunConfig,
  RunSummary,
  TransformerScore,
  TransformerStatus,
} from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import { UnifiedDataset } from './dataset.js';
import { summarize } from './summary.js';

export const DEFAULT_PLATFORM_TIMEOUT_MS = 60_000;
const DEFAULT_BATCH_SIZE = 16;

export interface AnalyzeOptions {
  useTransformer: boolean;
  signal?: AbortSignal | undefined;
}

export interface PipelineOptions {
  /** Replaces the built-in collectors; the request's credential is then the factory's concern. */
  collectors?: CollectorFactory;
  collectorSettings?: Omit<CollectorSettings, 'socialXCredential'>;
  lexicon?: LexiconScorer;
  model?: ModelHandle;
  scoreCache?: ScoreCache;
  platformTimeoutMs?: number;
  batchSize?: number;
  maxInputTokens?: number;
  disagreementDiscount?: number;
  logger?: Logger;
}

export interface AnalysisRun {
  dataset: UnifiedDataset;
  summary: RunSummary;
}

interface PreparedRecord {
  record: RawRecord;
  text: CleanText;
  lexicon: LexiconScore;
}

type Drained = { kind: 'ok'; records: RawRecord[] } | { kind: 'failed'; error: unknown };

/**
 * Runs one analysis: collect from every selected platform concurrently, clean and score each
 * record, then reconcile the two scorers into a dataset and a summary. A platform that fails,
 * hangs, or lacks configuration contributes zero records without touching the others.
 */
export class SentimentPipeline {
  private readonly lexicon: LexiconScorer;
  private readonly platformTimeoutMs: number;
  private readonly batchSize: number;
  private readonly disagreementDiscount: number;
  private readonly logger: Logger;

  constructor(private readonly options: PipelineOptions = {}) {
    this.lexicon = options.lexicon ?? new LexiconScorer();
    this.platformTimeoutMs = options.platformTimeoutMs ?? DEFAULT_PLATFORM_TIMEOUT_MS;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
    this.disagreementDiscount = options.disagreementDiscount ?? DEFAULT_DISAGREEMENT_DISCOUNT;
    this.logger = options.logger ?? createLogger('pipeline');
    if (this.platformTimeoutMs <= 0) {
      throw new RangeError('platformTimeoutMs must be greater than 0');
    }
    if (this.batchSize <= 0) {
      throw new RangeError('batchSize must be greater than 0');
    }
  }

  async search(request: RunConfig, signal?: AbortSignal): Promise<AnalysisRun> {
    const query = request.query.trim();
    if (!query) {
      throw new ConfigurationError('A search query is required.');
    }
    if (request.platforms.length === 0) {
      throw new ConfigurationError('Select at least one platform.');
    }
    if (!Number.isInteger(request.limitPerPlatform) || request.limitPerPlatform <= 0) {
      throw new ConfigurationError(`Per-platform limit must be a positive integer, received ${request.limitPerPlatform}`);
    }

    const factory =
      this.options.collectors ??
      collectorFactory({ ...this.options.collectorSettings, socialXCredential: request.socialXCredential });
    const platforms = [...new Set(request.platforms)];
    this.logger(`Collecting "${query}" from ${platforms.join(', ')} (limit ${request.limitPerPlatform} each)`);

    const collected = await Promise.all(
      platforms.map((platform) => this.collectPlatform(factory, platform, query, request.limitPerPlatform, signal)),
    );
    const outcomes = collected.map((entry) => entry.outcome);
    const records = collected.flatMap((entry) => entry.records);

    return this.analyze(records, { useTransformer: request.useTransformer, signal }, outcomes);
  }

  /** Scores records supplied by the caller, such as an uploaded file. */
  async analyzeRecords(records: readonly RawRecord[], options: AnalyzeOptions): Promise<AnalysisRun> {
    const usable = records.filter((record) => record.id.trim() && record.text.trim());
    if (usable.length < records.length) {
      this.logger(`Skipped ${records.length - usable.length} records without id or text`);
    }
    return this.analyze(usable, options, []);
  }

  private async collectPlatform(
    factory: CollectorFactory,
    platform: OnlinePlatform,
    query: string,
    limit: number,
    signal: AbortSignal | undefined,
  ): Promise<{ outcome: PlatformOutcome; records: RawRecord[] }> {
    let collector: Collector;
    try {
      collector = factory(platform);
    } catch (error) {
      const status = error instanceof ConfigurationError ? 'misconfigured' : 'failed';
      this.logger(`Skipping ${platform}: ${describeError(error)}`);
      return { outcome: { platform, status, records: 0, message: describeError(error) }, records: [] };
    }

    const controller = new AbortController();
    const forwardAbort = () => controller.abort(signal?.reason);
    if (signal?.aborted) {
      controller.abort(signal.reason);
    } else {
      signal?.addEventListener('abort', forwardAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<'timeout'>((resolve) => {
      timer = setTimeout(() => resolve('timeout'), this.platformTimeoutMs);
    });

    try {
      const result = await Promise.race([this.drain(collector, query, limit, controller.signal), timeout]);
      if (result === 'timeout') {
        controller.abort(new Error(`${platform} timed out`));
        const message = `No answer within ${this.platformTimeoutMs} ms`;
        this.logger(`${platform}: ${message}`);
        return { outcome: { platform, status: 'timed-out', records: 0, message }, records: [] };
      }
      if (result.kind === 'failed') {
        const message = describeError(result.error);
        this.logger(`${platform} failed: ${message}`);
        return { outcome: { platform, status: 'failed', records: 0, message }, records: [] };
      }

      this.logger(`${platform}: ${result.records.length} records`);
      return { outcome: { platform, status: 'ok', records: result.records.length }, records: result.records };
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', forwardAbort);
    }
  }

  private async drain(collector: Collector, query: string, limit: number, signal: AbortSignal): Promise<Drained> {
    const records: RawRecord[] = [];
    try {
      for await (const record of collector.fetch(query, limit, { signal })) {
        if (record.text.trim() && record.id.trim()) {
          records.push(record);
        }
        if (records.length >= limit) {
          break;
        }
      }
      return { kind: 'ok', records };
    } catch (error) {
      return { kind: 'failed', error };
    }
  }

  private async analyze(
    records: readonly RawRecord[],
    options: AnalyzeOptions,
    outcomes: PlatformOutcome[],
  ): Promise<AnalysisRun> {
    const prepared: PreparedRecord[] = [];
    for (const record of records) {
      const text = clean(record.text);
      try {
        prepared.push({ record, text, lexicon: this.lexicon.score(text) });
      } catch (error) {
        this.logger(`Skipped ${record.id}, lexicon scoring failed: ${describeError(error)}`);
      }
    }

    const { scorer, status, message } = await this.prepareTransformer(options.useTransformer);
    const dataset = new UnifiedDataset();
    let cancelled = false;
    let transformerFailures = 0;

    for (let start = 0; start < prepared.length; start += this.batchSize) {
      if (options.signal?.aborted) {
        cancelled = true;
        this.logger(`Cancelled after ${dataset.size} of ${prepared.length} records`);
        break;
      }

      const batch = prepared.slice(start, start + this.batchSize);
      let scores: Array<TransformerScore | undefined> | undefined;
      if (scorer) {
        try {
          const scored = await scorer.scoreBatch(batch.map((item) => item.text));
          scores = scored.scores;
          transformerFailures += scored.failures.length;
          for (const failure of scored.failures) {
            const id = batch[failure.index]?.record.id ?? String(start + failure.index);
            this.logger(`Transformer could not score ${id}, keeping its lexicon score: ${failure.error.message}`);
          }
        } catch (error) {
          transformerFailures += batch.length;
          this.logger(`Transformer batch at ${start} failed, keeping lexicon scores: ${describeError(error)}`);
        }
      }

      batch.forEach((item, index) => {
        const result = reconcile(
          {
            recordId: item.record.id,
            platform: item.record.platform,
            lexicon: item.lexicon,
            transformer: scores?.[index],
          },
          this.disagreementDiscount,
        );
        dataset.append(item.record, item.text, result);
      });
    }

    const summary = summarize(dataset.rows, {
      transformerStatus: status,
      transformerMessage: message,
      transformerFailures,
      outcomes,
      cancelled,
    });
    return { dataset, summary };
  }

  private async prepareTransformer(
    requested: boolean,
  ): Promise<{ scorer?: TransformerScorer; status: TransformerStatus; message?: string }> {
    if (!requested) {
      return { status: 'disabled' };
    }
    if (!this.options.model) {
      return { status: 'unavailable', message: 'No sentiment model is configured.' };
    }

    try {
      const model = await this.options.model.load();
      const scorer = new TransformerScorer(model, {
        batchSize: this.batchSize,
        logger: createLogger('transformer', model.id),
        ...(this.options.scoreCache ? { cache: this.options.scoreCache } : {}),
        ...(this.options.maxInputTokens !== undefined ? { maxInputTokens: this.options.maxInputTokens } : {}),
      });
      return { scorer, status: 'used' };
    } catch (error) {
      if (!(error instanceof ScoringUnavailableError)) {
        throw error;
      }
      this.logger(`Transformer unavailable, continuing lexicon-only: ${error.message}`);
      return { status: 'unavailable', message: error.message };
    }
  }
}
