import { CollectionError } from '../errors.js';
import { jot } from '../jot.js';
import type { RawRecord } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { fromUnixSeconds } from '../utils/time.js';
import { assertLimit, compactMetadata, readPayload, toRawRecord, type CollectOptions, type Collector } from './collector.js';
import { fetchWithBackoff, type FetchLike } from './http.js';

const DEFAULT_BASE_URL = 'https://www.reddit.com/search.json';
const MAX_PAGE_SIZE = 100;

const postNode = jot.object({
  id: jot.string(),
  title: jot.optional(jot.string()),
  selftext: jot.optional(jot.string()),
  author: jot.optional(jot.string()),
  created_utc: jot.optional(jot.number()),
  score: jot.optional(jot.number()),
  num_comments: jot.optional(jot.number()),
  subreddit: jot.optional(jot.string()),
  permalink: jot.optional(jot.string()),
});

const listingNode = jot.object({
  data: jot.object({
    after: jot.optional(jot.string()),
    children: jot.array(jot.object({ data: postNode })),
  }),
});

export interface RedditCollectorOptions {
  baseUrl?: string;
  sort?: string;
  timeFilter?: string;
  userAgent?: string;
  maxRetries?: number;
  retryBackoffMs?: number;
  requestSpacingMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/** Public search JSON; no credentials. */
export class RedditCollector implements Collector {
  readonly platform = 'reddit' as const;
  private readonly baseUrl: string;
  private readonly sort: string;
  private readonly timeFilter: string;
  private readonly userAgent: string;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly requestSpacingMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: RedditCollectorOptions = {}) {
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.sort = options.sort ?? 'relevance';
    this.timeFilter = options.timeFilter ?? 'month';
    this.userAgent = options.userAgent ?? 'sentiment-ensemble/0.1.0 (keyword search)';
    this.maxRetries = options.maxRetries ?? 3;
    this.retryBackoffMs = options.retryBackoffMs ?? 10000;
    this.requestSpacingMs = options.requestSpacingMs ?? 1500;
    this.fetchImpl = options.fetchImpl;
    this.logger = options.logger;
  }

  async *fetch(query: string, limit: number, options: CollectOptions = {}): AsyncGenerator<RawRecord> {
    assertLimit(limit);
    let after: string | undefined;
    let yielded = 0;
    let page = 0;

    while (yielded < limit) {
      if (page > 0) {
        await sleep(this.requestSpacingMs, options.signal);
      }
      page += 1;

      const params = new URLSearchParams({
        q: query,
        limit: String(Math.min(MAX_PAGE_SIZE, limit - yielded)),
        sort: this.sort,
        t: this.timeFilter,
        type: 'link',
      });
      if (after) {
        params.set('after', after);
      }

      const response = await fetchWithBackoff(
        `${this.baseUrl}?${params.toString()}`,
        { headers: { 'User-Agent': this.userAgent, Accept: 'application/json' } },
        {
          maxRetries: this.maxRetries,
          retryBackoffMs: this.retryBackoffMs,
          retryStatuses: [429],
          fetchImpl: this.fetchImpl,
          logger: this.logger,
          signal: options.signal,
        },
      );

      if (!response.ok) {
        if (page === 1) {
          throw new CollectionError('reddit', `Reddit search returned status ${response.status}`);
        }
        this.logger?.(`Stopping after page ${page - 1}: status ${response.status}`);
        break;
      }

      const listing = await readPayload(response, listingNode, 'reddit', 'Reddit listing');

      const children = listing.data.children;
      if (children.length === 0) {
        break;
      }

      for (const { data: post } of children) {
        const title = post.title?.trim() ?? '';
        const body = post.selftext?.trim() ?? '';
        const record = toRawRecord({
          id: post.id,
          platform: 'reddit',
          text: body ? `${title}. ${body}` : title,
          timestamp: post.created_utc === undefined ? undefined : fromUnixSeconds(post.created_utc),
          author: post.author ?? '[deleted]',
          engagement: post.score,
          metadata: compactMetadata({
            subreddit: post.subreddit,
            comments: post.num_comments,
            url: post.permalink ? `https://reddit.com${post.permalink}` : undefined,
          }),
        });
        if (!record) {
          continue;
        }

        yield record;
        yielded += 1;
        if (yielded >= limit) {
          break;
        }
      }

      after = listing.data.after;
      if (!after) {
        break;
      }
    }

    this.logger?.(`Collected ${yielded} posts for "${query}"`);
  }
}
