import { CollectionError, ConfigurationError } from '../errors.js';
import { jot } from '../jot.js';
import type { RawRecord } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { parseTimestamp } from '../utils/time.js';
import { assertLimit, compactMetadata, readPayload, toRawRecord, type CollectOptions, type Collector } from './collector.js';
import { fetchWithBackoff, type FetchLike } from './http.js';

const DEFAULT_SEARCH_URL = 'https://api.twitter.com/2/tweets/search/recent';
const MIN_PAGE_SIZE = 10;
const MAX_PAGE_SIZE = 100;

const searchNode = jot.object({
  data: jot.optional(
    jot.array(
      jot.object({
        id: jot.string(),
        text: jot.string(),
        author_id: jot.optional(jot.string()),
        created_at: jot.optional(jot.string()),
        public_metrics: jot.optional(
          jot.object({
            like_count: jot.optional(jot.number()),
            retweet_count: jot.optional(jot.number()),
            reply_count: jot.optional(jot.number()),
          }),
        ),
      }),
    ),
  ),
  includes: jot.optional(
    jot.object({
      users: jot.optional(jot.array(jot.object({ id: jot.string(), username: jot.string() }))),
    }),
  ),
  meta: jot.optional(jot.object({ next_token: jot.optional(jot.string()) })),
});

export interface SocialXCollectorOptions {
  bearerToken: string | undefined;
  searchUrl?: string;
  requestSpacingMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/** Recent-search API behind a bearer token. */
export class SocialXCollector implements Collector {
  readonly platform = 'social-x' as const;
  private readonly bearerToken: string;
  private readonly searchUrl: string;
  private readonly requestSpacingMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: SocialXCollectorOptions) {
    const token = options.bearerToken?.trim();
    if (!token) {
      throw new ConfigurationError('SocialX requires a bearer token (SOCIAL_X_BEARER_TOKEN).', 'social-x');
    }
    this.bearerToken = token;
    this.searchUrl = options.searchUrl ?? DEFAULT_SEARCH_URL;
    this.requestSpacingMs = options.requestSpacingMs ?? 1000;
    this.fetchImpl = options.fetchImpl;
    this.logger = options.logger;
  }

  async *fetch(query: string, limit: number, options: CollectOptions = {}): AsyncGenerator<RawRecord> {
    assertLimit(limit);
    let nextToken: string | undefined;
    let yielded = 0;
    let page = 0;

    while (yielded < limit) {
      if (page > 0) {
        await sleep(this.requestSpacingMs, options.signal);
      }
      page += 1;

      const params = new URLSearchParams({
        query: `${query} -is:retweet lang:en`,
        max_results: String(Math.max(MIN_PAGE_SIZE, Math.min(MAX_PAGE_SIZE, limit - yielded))),
        'tweet.fields': 'created_at,public_metrics,author_id',
        'user.fields': 'username',
        expansions: 'author_id',
      });
      if (nextToken) {
        params.set('next_token', nextToken);
      }

      // The rate-limit window is 15 minutes, so a 429 ends the run instead of waiting.
      const response = await fetchWithBackoff(
        `${this.searchUrl}?${params.toString()}`,
        { headers: { Authorization: `Bearer ${this.bearerToken}` } },
        { maxRetries: 1, retryBackoffMs: 0, retryStatuses: [], fetchImpl: this.fetchImpl, signal: options.signal },
      );

      if (response.status === 401) {
        throw new CollectionError('social-x', 'SocialX rejected the bearer token (401).');
      }
      if (response.status === 429) {
        this.logger?.(`Rate limit reached after ${yielded} posts.`);
        break;
      }
      if (!response.ok) {
        if (page === 1) {
          throw new CollectionError('social-x', `SocialX search returned status ${response.status}`);
        }
        this.logger?.(`Stopping after page ${page - 1}: status ${response.status}`);
        break;
      }

      const payload = await readPayload(response, searchNode, 'social-x', 'SocialX search');

      const posts = payload.data ?? [];
      if (posts.length === 0) {
        break;
      }

      const usernames = new Map((payload.includes?.users ?? []).map((user) => [user.id, user.username] as const));
      for (const post of posts) {
        const username = post.author_id ? usernames.get(post.author_id) : undefined;
        const record = toRawRecord({
          id: post.id,
          platform: 'social-x',
          text: post.text,
          timestamp: parseTimestamp(post.created_at),
          author: `@${username ?? 'unknown'}`,
          engagement: post.public_metrics?.like_count,
          metadata: compactMetadata({
            reposts: post.public_metrics?.retweet_count,
            replies: post.public_metrics?.reply_count,
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

      nextToken = payload.meta?.next_token;
      if (!nextToken) {
        break;
      }
    }

    this.logger?.(`Collected ${yielded} posts`);
  }
}
