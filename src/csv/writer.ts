import { createWriteStream, WriteStream } from 'node:fs';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { finished } from 'node:stream/promises';
import type { DatasetRow } from '../types/index.js';
import { toIso } from '../utils/time.js';

export const HEADER = [
  'record_id',
  'platform',
  'timestamp',
  'author',
  'engagement',
  'text',
  'normalized_text',
  'text_length',
  'lexicon_compound',
  'lexicon_label',
  'transformer_label',
  'transformer_confidence',
  'final_label',
  'final_confidence',
  'score',
  'agreement',
] as const;

export type CsvColumn = (typeof HEADER)[number];
export type CsvRow = Record<CsvColumn, string | number>;

export function toCsvRow(row: DatasetRow): CsvRow {
  return {
    record_id: row.recordId,
    platform: row.platform,
    timestamp: toIso(row.timestamp),
    author: row.author ?? '',
    engagement: row.engagement ?? '',
    text: row.text,
    normalized_text: row.normalizedText,
    text_length: row.textLength,
    lexicon_compound: round(row.lexicon.compound),
    lexicon_label: row.lexicon.label,
    transformer_label: row.transformer?.label ?? '',
    transformer_confidence: row.transformer ? round(row.transformer.confidence) : '',
    final_label: row.finalLabel,
    final_confidence: round(row.finalConfidence),
    score: round(row.score),
    agreement: row.agreement ? 'yes' : 'no',
  };
}

export function formatCsvLine(row: CsvRow): string {
  return HEADER.map((key) => csvEscape(String(row[key]))).join(',');
}

export class CsvStreamWriter {
  private constructor(private readonly destination: string, private readonly stream: WriteStream) {}

  static async create(destination: string): Promise<CsvStreamWriter> {
    await fs.mkdir(path.dirname(destination), { recursive: true });
    const stream = createWriteStream(destination, { encoding: 'utf8' });
    stream.write(`${HEADER.join(',')}\n`);
    return new CsvStreamWriter(destination, stream);
  }

  async writeRow(row: DatasetRow): Promise<void> {
    if (!this.stream.write(`${formatCsvLine(toCsvRow(row))}\n`)) {
      await onceDrain(this.stream);
    }
  }

  async close(): Promise<void> {
    this.stream.end();
    await finished(this.stream);
  }

  get path(): string {
    return this.destination;
  }
}

async function onceDrain(stream: WriteStream): Promise<void> {
  await new Promise<void>((resolve) => stream.once('drain', resolve));
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

export function csvEscape(value: string): string {
  const needsQuotes = value.includes(',') || value.includes('\n') || value.includes('"');
  const sanitized = value.replace(/\r?\n/g, ' ').replace(/"/g, '""');
  return needsQuotes ? `"${sanitized}"` : sanitized;
}
