import type { CleanText, DatasetRow, RawRecord, ReconciledResult } from '../types/index.js';

/** Append-only, insertion-ordered results of one analysis run. */
export class UnifiedDataset implements Iterable<DatasetRow> {
  private readonly entries: DatasetRow[] = [];

  append(record: RawRecord, text: CleanText, result: ReconciledResult): DatasetRow {
    if (record.id !== result.recordId) {
      throw new Error(`Result for ${result.recordId} cannot be joined with record ${record.id}`);
    }

    const row: DatasetRow = Object.freeze({
      ...result,
      text: record.text,
      normalizedText: text.normalized,
      textLength: text.length,
      ...(record.timestamp ? { timestamp: record.timestamp } : {}),
      ...(record.author !== undefined ? { author: record.author } : {}),
      ...(record.engagement !== undefined ? { engagement: record.engagement } : {}),
      ...(record.metadata ? { metadata: Object.freeze({ ...record.metadata }) } : {}),
    });
    this.entries.push(row);
    return row;
  }

  get rows(): readonly DatasetRow[] {
    return this.entries.slice();
  }

  get size(): number {
    return this.entries.length;
  }

  [Symbol.iterator](): Iterator<DatasetRow> {
    return this.entries.slice()[Symbol.iterator]();
  }
}
