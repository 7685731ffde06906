import type { Platform } from './types/index.js';

/** A selected platform or the run itself is missing something it needs, such as a credential. */
export class ConfigurationError extends Error {
  override readonly name = 'ConfigurationError';

  constructor(message: string, readonly platform?: Platform) {
    super(message);
  }
}

export class CollectionError extends Error {
  override readonly name = 'CollectionError';

  constructor(readonly platform: Platform, message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ScoringUnavailableError extends Error {
  override readonly name = 'ScoringUnavailableError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** A score reached the reconciler outside its declared range. This is a bug, not a runtime condition. */
export class ContractViolationError extends Error {
  override readonly name = 'ContractViolationError';
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
