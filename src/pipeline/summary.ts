import type {
  AuthorCount,
  DatasetRow,
  FlatSummary,
  LabelDistribution,
  NotableText,
  Platform,
  PlatformBreakdown,
  PlatformOutcome,
  RunSummary,
  SentimentLabel,
  TransformerStatus,
} from '../types/index.js';
import { SENTIMENT_LABELS } from '../types/index.js';

export const TOP_AUTHOR_COUNT = 10;
export const NOTABLE_TEXT_COUNT = 5;

export interface SummaryContext {
  transformerStatus: TransformerStatus;
  transformerMessage?: string | undefined;
  transformerFailures?: number;
  outcomes?: PlatformOutcome[];
  cancelled?: boolean;
}

function emptyCounts(): LabelDistribution {
  return { negative: 0, neutral: 0, positive: 0 };
}

/** Most frequent label; any tie for first place goes to neutral. */
export function dominantLabel(counts: LabelDistribution): SentimentLabel {
  const top = Math.max(...SENTIMENT_LABELS.map((label) => counts[label]));
  const leaders = SENTIMENT_LABELS.filter((label) => counts[label] === top);
  return leaders.length === 1 && leaders[0] ? leaders[0] : 'neutral';
}

function mean(values: readonly number[]): number {
  return values.length === 0 ? 0 : values.reduce((sum, value) => sum + value, 0) / values.length;
}

/** Authors by record count; equal counts keep the order authors first appeared in. */
export function topAuthors(rows: readonly DatasetRow[], count: number = TOP_AUTHOR_COUNT): AuthorCount[] {
  const counts = new Map<string, number>();
  for (const row of rows) {
    if (row.author) {
      counts.set(row.author, (counts.get(row.author) ?? 0) + 1);
    }
  }
  return [...counts]
    .map(([author, records]) => ({ author, records }))
    .sort((a, b) => b.records - a.records)
    .slice(0, count);
}

/** Records labelled `label`, strongest blended score first. */
export function notableTexts(
  rows: readonly DatasetRow[],
  label: 'positive' | 'negative',
  count: number = NOTABLE_TEXT_COUNT,
): NotableText[] {
  const direction = label === 'positive' ? -1 : 1;
  return rows
    .filter((row) => row.finalLabel === label)
    .sort((a, b) => direction * (a.score - b.score))
    .slice(0, count)
    .map((row) => ({ recordId: row.recordId, platform: row.platform, text: row.text, score: row.score }));
}

export function summarize(rows: readonly DatasetRow[], context: SummaryContext): RunSummary {
  const labelCounts = emptyCounts();
  const perPlatform = new Map<Platform, LabelDistribution>();
  let withTransformer = 0;
  let agreed = 0;

  for (const row of rows) {
    labelCounts[row.finalLabel] += 1;
    const counts = perPlatform.get(row.platform) ?? emptyCounts();
    counts[row.finalLabel] += 1;
    perPlatform.set(row.platform, counts);
    if (row.transformer) {
      withTransformer += 1;
      if (row.agreement) {
        agreed += 1;
      }
    }
  }

  const platforms: Partial<Record<Platform, PlatformBreakdown>> = {};
  for (const [platform, counts] of perPlatform) {
    platforms[platform] = {
      total: counts.negative + counts.neutral + counts.positive,
      counts,
      dominantLabel: dominantLabel(counts),
    };
  }

  const labelShares = emptyCounts();
  for (const label of SENTIMENT_LABELS) {
    labelShares[label] = rows.length === 0 ? 0 : labelCounts[label] / rows.length;
  }

  return {
    totalRecords: rows.length,
    dominantLabel: dominantLabel(labelCounts),
    labelCounts,
    labelShares,
    platforms,
    agreementRate: withTransformer === 0 ? null : agreed / withTransformer,
    averageConfidence: mean(rows.map((row) => row.finalConfidence)),
    averageScore: mean(rows.map((row) => row.score)),
    averageTextLength: mean(rows.map((row) => row.textLength)),
    topAuthors: topAuthors(rows),
    notableTexts: { positive: notableTexts(rows, 'positive'), negative: notableTexts(rows, 'negative') },
    transformerStatus: context.transformerStatus,
    ...(context.transformerMessage ? { transformerMessage: context.transformerMessage } : {}),
    transformerFailures: context.transformerFailures ?? 0,
    outcomes: context.outcomes ?? [],
    cancelled: context.cancelled ?? false,
  };
}

/** Named statistics for dashboards and exports. */
export function flattenSummary(summary: RunSummary): FlatSummary {
  const flat: FlatSummary = {
    total_records: summary.totalRecords,
    dominant_label: summary.dominantLabel,
    agreement_rate: summary.agreementRate,
    average_confidence: summary.averageConfidence,
    average_score: summary.averageScore,
    average_text_length: summary.averageTextLength,
    transformer_status: summary.transformerStatus,
    transformer_message: summary.transformerMessage ?? null,
    transformer_failures: summary.transformerFailures,
    cancelled: String(summary.cancelled),
  };

  for (const label of SENTIMENT_LABELS) {
    flat[`label.${label}`] = summary.labelCounts[label];
    flat[`share.${label}`] = summary.labelShares[label];
  }

  for (const [platform, breakdown] of Object.entries(summary.platforms)) {
    if (!breakdown) {
      continue;
    }
    flat[`platform.${platform}.total`] = breakdown.total;
    flat[`platform.${platform}.dominant_label`] = breakdown.dominantLabel;
    for (const label of SENTIMENT_LABELS) {
      flat[`platform.${platform}.${label}`] = breakdown.counts[label];
    }
  }

  summary.topAuthors.forEach((entry, index) => {
    flat[`top_author.${index + 1}`] = entry.author;
    flat[`top_author.${index + 1}.records`] = entry.records;
  });

  for (const label of ['positive', 'negative'] as const) {
    summary.notableTexts[label].forEach((entry, index) => {
      flat[`notable.${label}.${index + 1}`] = entry.text;
      flat[`notable.${label}.${index + 1}.score`] = entry.score;
    });
  }

  for (const outcome of summary.outcomes) {
    flat[`collection.${outcome.platform}.status`] = outcome.status;
    flat[`collection.${outcome.platform}.records`] = outcome.records;
    if (outcome.message) {
      flat[`collection.${outcome.platform}.message`] = outcome.message;
    }
  }

  return flat;
}
