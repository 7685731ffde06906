import { describe, expect, it } from 'vitest';
import { fetchWithBackoff, type FetchLike } from './http.js';

describe('fetchWithBackoff', () => {
  it('hands back the last response once retries run out', async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls += 1;
      return new Response('', { status: 429 });
    };

    const response = await fetchWithBackoff(
      'https://api.test/items',
      {},
      { maxRetries: 3, retryBackoffMs: 0, retryStatuses: [429], fetchImpl },
    );

    expect(response.status).toBe(429);
    expect(calls).toBe(3);
  });

  it('does not retry statuses outside the policy', async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls += 1;
      return new Response('', { status: 500 });
    };

    const response = await fetchWithBackoff('https://api.test/items', {}, { maxRetries: 3, retryBackoffMs: 0, retryStatuses: [429], fetchImpl });

    expect(response.status).toBe(500);
    expect(calls).toBe(1);
  });

  it('retries network errors and rethrows the last one', async () => {
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls += 1;
      throw new Error(`socket closed ${calls}`);
    };

    await expect(
      fetchWithBackoff('https://api.test/items', {}, { maxRetries: 2, retryBackoffMs: 0, retryStatuses: [], fetchImpl }),
    ).rejects.toThrow('socket closed 2');
  });

  it('passes the abort signal through to fetch', async () => {
    const controller = new AbortController();
    let seen: AbortSignal | null | undefined;
    const fetchImpl: FetchLike = async (_url, init) => {
      seen = init?.signal;
      return new Response('', { status: 200 });
    };

    await fetchWithBackoff('https://api.test/items', {}, {
      maxRetries: 1,
      retryBackoffMs: 0,
      retryStatuses: [],
      fetchImpl,
      signal: controller.signal,
    });

    expect(seen).toBe(controller.signal);
  });
});
