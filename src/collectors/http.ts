import { sleep } from '../utils/sleep.js';
import type { Logger } from '../utils/logger.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface BackoffPolicy {
  maxRetries: number;
  retryBackoffMs: number;
  /** Statuses worth waiting out; anything else is handed back to the caller. */
  retryStatuses: readonly number[];
  fetchImpl?: FetchLike | undefined;
  logger?: Logger | undefined;
  signal?: AbortSignal | undefined;
}

function retryAfterMs(response: Response): number | undefined {
  const header = response.headers.get('retry-after');
  if (header === null) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) && seconds >= 0 ? seconds * 1000 : undefined;
}

/**
 * GETs `url`, waiting out retryable statuses and network errors with linear backoff. The final
 * attempt's response is returned whatever its status; the final network error is rethrown.
 */
export async function fetchWithBackoff(url: string, init: RequestInit, policy: BackoffPolicy): Promise<Response> {
  const fetchImpl: FetchLike = policy.fetchImpl ?? fetch;
  const attempts = Math.max(1, policy.maxRetries);

  for (let attempt = 0; attempt < attempts; attempt += 1) {
    const isLast = attempt === attempts - 1;
    let response: Response;
    try {
      response = await fetchImpl(url, { ...init, ...(policy.signal ? { signal: policy.signal } : {}) });
    } catch (error) {
      if (isLast || policy.signal?.aborted) {
        throw error;
      }
      const waitMs = policy.retryBackoffMs * (attempt + 1);
      policy.logger?.(`Request failed (${error instanceof Error ? error.message : String(error)}). Retrying in ${waitMs}ms.`);
      await sleep(waitMs, policy.signal);
      continue;
    }

    if (isLast || !policy.retryStatuses.includes(response.status)) {
      return response;
    }

    const waitMs = retryAfterMs(response) ?? policy.retryBackoffMs * (attempt + 1);
    policy.logger?.(`Received ${response.status}. Waiting ${Math.round(waitMs / 1000)}s before retry #${attempt + 1}.`);
    await sleep(waitMs, policy.signal);
  }

  throw new Error('Exceeded retry budget.');
}
