export function fromUnixSeconds(epochSeconds: number): Date | undefined {
  if (!Number.isFinite(epochSeconds) || epochSeconds <= 0) {
    return undefined;
  }
  return new Date(Math.floor(epochSeconds) * 1000);
}

/** Accepts ISO strings, free-form dates `Date.parse` understands, or epoch seconds. */
export function parseTimestamp(value: string | number | undefined | null): Date | undefined {
  if (value === undefined || value === null || value === '') {
    return undefined;
  }

  if (typeof value === 'number') {
    return fromUnixSeconds(value);
  }

  const asNumber = Number(value);
  if (!Number.isNaN(asNumber)) {
    return fromUnixSeconds(asNumber);
  }

  const parsed = Date.parse(value);
  if (Number.isNaN(parsed)) {
    return undefined;
  }
  return new Date(parsed);
}

export function toIso(date: Date | undefined): string {
  return date ? date.toISOString() : '';
}
