import { describe, expect, it } from 'vitest';
import { fromUnixSeconds, parseTimestamp, toIso } from './time.js';

describe('parseTimestamp', () => {
  it('reads ISO strings and epoch seconds', () => {
    expect(parseTimestamp('2024-03-01T10:00:00Z')).toEqual(new Date('2024-03-01T10:00:00Z'));
    expect(parseTimestamp(1700000000)).toEqual(new Date(1700000000000));
    expect(parseTimestamp('1700000000')).toEqual(new Date(1700000000000));
  });

  it('returns undefined for blanks and garbage', () => {
    expect(parseTimestamp(undefined)).toBeUndefined();
    expect(parseTimestamp('')).toBeUndefined();
    expect(parseTimestamp('not a date')).toBeUndefined();
    expect(fromUnixSeconds(0)).toBeUndefined();
  });
});

describe('toIso', () => {
  it('renders missing dates as empty text', () => {
    expect(toIso(undefined)).toBe('');
    expect(toIso(new Date(0))).toBe('1970-01-01T00:00:00.000Z');
  });
});
