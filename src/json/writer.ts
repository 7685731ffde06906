import { promises as fs } from 'node:fs';
import path from 'node:path';
import type { DatasetRow, SentimentLabel } from '../types/index.js';
import { toIso } from '../utils/time.js';

export interface JsonRow {
  record_id: string;
  platform: string;
  timestamp: string | null;
  author: string | null;
  engagement: number | null;
  text: string;
  normalized_text: string;
  lexicon_compound: number;
  lexicon_label: SentimentLabel;
  transformer_label: SentimentLabel | null;
  transformer_confidence: number | null;
  final_label: SentimentLabel;
  final_confidence: number;
  score: number;
  agreement: boolean;
}

export function toJsonRow(row: DatasetRow): JsonRow {
  return {
    record_id: row.recordId,
    platform: row.platform,
    timestamp: row.timestamp ? toIso(row.timestamp) : null,
    author: row.author ?? null,
    engagement: row.engagement ?? null,
    text: row.text,
    normalized_text: row.normalizedText,
    lexicon_compound: row.lexicon.compound,
    lexicon_label: row.lexicon.label,
    transformer_label: row.transformer?.label ?? null,
    transformer_confidence: row.transformer?.confidence ?? null,
    final_label: row.finalLabel,
    final_confidence: row.finalConfidence,
    score: row.score,
    agreement: row.agreement,
  };
}

/** Writes the dataset as one indented JSON array of records. */
export async function writeJsonRows(destination: string, rows: Iterable<DatasetRow>): Promise<number> {
  const records = Array.from(rows, toJsonRow);
  await fs.mkdir(path.dirname(destination), { recursive: true });
  await fs.writeFile(destination, `${JSON.stringify(records, null, 2)}\n`, 'utf8');
  return records.length;
}
