import { describe, expect, it } from 'vitest';
import { CollectionError } from '../errors.js';
import type { RawRecord } from '../types/index.js';
import type { FetchLike } from './http.js';
import { RedditCollector } from './reddit.js';

function listing(children: Array<Record<string, unknown>>, after: string | null): Response {
  return new Response(JSON.stringify({ data: { after, children: children.map((data) => ({ data })) } }), {
    status: 200,
  });
}

async function collect(iterable: AsyncIterable<RawRecord>): Promise<RawRecord[]> {
  const records: RawRecord[] = [];
  for await (const record of iterable) {
    records.push(record);
  }
  return records;
}

describe('RedditCollector', () => {
  it('pages with the after cursor and stops at the limit', async () => {
    const urls: string[] = [];
    const pages = [
      listing(
        [
          {
            id: 'a',
            title: 'Great phone',
            selftext: 'Battery lasts',
            author: 'sam',
            created_utc: 1700000000,
            score: 12,
            num_comments: 3,
            subreddit: 'gadgets',
            permalink: '/r/gadgets/comments/a/',
          },
          { id: 'empty', title: '  ', selftext: '' },
        ],
        't3_empty',
      ),
      listing(
        [
          { id: 'b', title: 'Screen cracked' },
          { id: 'c', title: 'Returned it' },
          { id: 'd', title: 'Never reached' },
        ],
        't3_d',
      ),
    ];
    const fetchImpl: FetchLike = async (url) => {
      urls.push(url);
      const page = pages.shift();
      if (!page) {
        throw new Error('unexpected request');
      }
      return page;
    };

    const collector = new RedditCollector({ fetchImpl, requestSpacingMs: 0 });
    const records = await collect(collector.fetch('phone', 3));

    expect(records.map((record) => record.id)).toEqual(['a', 'b', 'c']);
    expect(records[0]).toEqual({
      id: 'a',
      platform: 'reddit',
      text: 'Great phone. Battery lasts',
      timestamp: new Date(1700000000 * 1000),
      author: 'sam',
      engagement: 12,
      metadata: { subreddit: 'gadgets', comments: 3, url: 'https://reddit.com/r/gadgets/comments/a/' },
    });
    expect(records[1]?.author).toBe('[deleted]');
    expect(urls).toHaveLength(2);
    expect(new URL(urls[0] ?? '').searchParams.get('limit')).toBe('3');
    expect(new URL(urls[1] ?? '').searchParams.get('after')).toBe('t3_empty');
    expect(new URL(urls[1] ?? '').searchParams.get('limit')).toBe('2');
  });

  it('fails when the first page is rejected', async () => {
    const fetchImpl: FetchLike = async () => new Response('nope', { status: 500 });
    const collector = new RedditCollector({ fetchImpl, requestSpacingMs: 0 });

    await expect(collect(collector.fetch('phone', 5))).rejects.toThrow(CollectionError);
  });

  it('keeps what it has when a later page is rejected', async () => {
    const responses = [listing([{ id: 'a', title: 'Fine' }], 't3_a'), new Response('', { status: 503 })];
    const fetchImpl: FetchLike = async () => responses.shift() ?? new Response('', { status: 500 });
    const collector = new RedditCollector({ fetchImpl, requestSpacingMs: 0 });

    const records = await collect(collector.fetch('phone', 5));
    expect(records.map((record) => record.text)).toEqual(['Fine']);
  });

  it('retries a rate-limited page', async () => {
    const responses = [
      new Response('', { status: 429, headers: { 'retry-after': '0' } }),
      listing([{ id: 'a', title: 'Fine' }], null),
    ];
    let calls = 0;
    const fetchImpl: FetchLike = async () => {
      calls += 1;
      return responses.shift() ?? new Response('', { status: 500 });
    };
    const collector = new RedditCollector({ fetchImpl, requestSpacingMs: 0 });

    expect(await collect(collector.fetch('phone', 5))).toHaveLength(1);
    expect(calls).toBe(2);
  });

  it('rejects a non-positive limit', async () => {
    const collector = new RedditCollector({ fetchImpl: async () => listing([], null) });

    await expect(collect(collector.fetch('phone', 0))).rejects.toThrow(RangeError);
  });
});
