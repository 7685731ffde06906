export type SentimentLabel = 'negative' | 'neutral' | 'positive';

export const SENTIMENT_LABELS = ['negative', 'neutral', 'positive'] as const satisfies readonly SentimentLabel[];

export type OnlinePlatform = 'reddit' | 'social-x' | 'marketplace';

export type Platform = OnlinePlatform | 'uploaded';

export const ONLINE_PLATFORMS = ['reddit', 'social-x', 'marketplace'] as const satisfies readonly OnlinePlatform[];

export type RecordMetadata = Record<string, string | number>;

export interface RawRecord {
  id: string;
  platform: Platform;
  text: string;
  timestamp?: Date;
  author?: string;
  engagement?: number;
  metadata?: RecordMetadata;
}

export interface CleanText {
  original: string;
  /** Case-preserved cleaned text; what both scorers see. */
  normalized: string;
  /** Lower-cased `normalized`. */
  folded: string;
  length: number;
}

export interface LexiconScore {
  compound: number;
  pos: number;
  neu: number;
  neg: number;
  label: SentimentLabel;
}

export type LabelDistribution = Record<SentimentLabel, number>;

export interface TransformerScore {
  label: SentimentLabel;
  confidence: number;
  distribution: LabelDistribution;
}

export interface ReconciledResult {
  readonly recordId: string;
  readonly platform: Platform;
  readonly lexicon: Readonly<LexiconScore>;
  readonly transformer?: Readonly<TransformerScore>;
  readonly finalLabel: SentimentLabel;
  readonly finalConfidence: number;
  /** Blended polarity in [-1, 1]. */
  readonly score: number;
  readonly agreement: boolean;
}

export interface DatasetRow extends ReconciledResult {
  readonly text: string;
  readonly normalizedText: string;
  readonly textLength: number;
  readonly timestamp?: Date;
  readonly author?: string;
  readonly engagement?: number;
  readonly metadata?: Readonly<RecordMetadata>;
}

/** One search run. Immutable once the run starts. */
export interface RunConfig {
  readonly platforms: readonly OnlinePlatform[];
  readonly query: string;
  readonly limitPerPlatform: number;
  readonly useTransformer: boolean;
  readonly socialXCredential?: string | undefined;
}

export type PlatformStatus = 'ok' | 'failed' | 'timed-out' | 'misconfigured';

export interface PlatformOutcome {
  platform: Platform;
  status: PlatformStatus;
  records: number;
  message?: string;
}

export type TransformerStatus = 'used' | 'disabled' | 'unavailable';

export interface PlatformBreakdown {
  total: number;
  counts: LabelDistribution;
  dominantLabel: SentimentLabel;
}

export interface AuthorCount {
  author: string;
  records: number;
}

export interface NotableText {
  recordId: string;
  platform: Platform;
  text: string;
  score: number;
}

export interface RunSummary {
  totalRecords: number;
  dominantLabel: SentimentLabel;
  labelCounts: LabelDistribution;
  /** Fraction of records per final label; all zero for an empty run. */
  labelShares: LabelDistribution;
  platforms: Partial<Record<Platform, PlatformBreakdown>>;
  /** Null when no record carries a transformer score. */
  agreementRate: number | null;
  averageConfidence: number;
  averageScore: number;
  averageTextLength: number;
  /** Most frequent authors, most records first. */
  topAuthors: AuthorCount[];
  /** Highest-scoring positive and lowest-scoring negative records. */
  notableTexts: { positive: NotableText[]; negative: NotableText[] };
  transformerStatus: TransformerStatus;
  transformerMessage?: string;
  /** Records left lexicon-only because the model could not score them. */
  transformerFailures: number;
  outcomes: PlatformOutcome[];
  cancelled: boolean;
}

export type FlatSummary = Record<string, string | number | null>;
