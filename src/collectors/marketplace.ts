import * as cheerio from 'cheerio';
import { CollectionError, describeError } from '../errors.js';
import type { RawRecord } from '../types/index.js';
import { checksumFrom } from '../utils/hash.js';
import type { Logger } from '../utils/logger.js';
import { sleep } from '../utils/sleep.js';
import { collapseWhitespace } from '../utils/text.js';
import { parseTimestamp } from '../utils/time.js';
import { assertLimit, compactMetadata, toRawRecord, type CollectOptions, type Collector } from './collector.js';
import { fetchWithBackoff, type FetchLike } from './http.js';

const DEFAULT_BASE_URL = 'https://www.amazon.in';
const PRODUCT_ID_LENGTH = 10;
const MAX_SEARCH_RESULTS = 10;
const MIN_REVIEW_LENGTH = 5;

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent':
    'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36',
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
};

export interface MarketplaceCollectorOptions {
  baseUrl?: string;
  maxProducts?: number;
  requestSpacingMs?: number;
  maxRetries?: number;
  retryBackoffMs?: number;
  fetchImpl?: FetchLike;
  logger?: Logger;
}

/** Unique product ids from a search results page, in page order. */
export function parseSearchResults(html: string): string[] {
  const $ = cheerio.load(html);
  const ids = $('[data-asin]')
    .toArray()
    .map((node) => ($(node).attr('data-asin') ?? '').trim())
    .filter((id) => id.length === PRODUCT_ID_LENGTH);
  return [...new Set(ids)].slice(0, MAX_SEARCH_RESULTS);
}

export function parseProductReviews(html: string, productId: string): RawRecord[] {
  const $ = cheerio.load(html);
  const productTitle = collapseWhitespace($('#productTitle').first().text()).slice(0, 100);

  let blocks = $('.cr-widget-FocalReviews .a-section.celwidget').toArray();
  if (blocks.length === 0) {
    blocks = $('[data-hook="review"]').toArray();
  }

  const records: RawRecord[] = [];
  for (const [position, block] of blocks.entries()) {
    const review = $(block);
    const body = collapseWhitespace(review.find('span[data-hook="review-body"]').first().text())
      .replace(/Read (?:more|less)/g, '')
      .trim();
    if (body.length < MIN_REVIEW_LENGTH) {
      continue;
    }

    // The title link also holds the "x out of 5 stars" span.
    const title = review
      .find('a[data-hook="review-title"] > span')
      .toArray()
      .map((span) => collapseWhitespace($(span).text()))
      .filter((text) => text.length > 0 && !text.includes('out of'))
      .pop();
    const text = title ? `${title}. ${body}` : body;

    const ratingText = review
      .find('i[data-hook="review-star-rating"] .a-icon-alt, i.review-rating .a-icon-alt')
      .first()
      .text()
      .trim();
    const rating = Number.parseFloat(ratingText.split(/\s+/)[0] ?? '');
    const author = collapseWhitespace(review.find('.a-profile-content .a-profile-name').first().text());
    const dateText = collapseWhitespace(review.find('span[data-hook="review-date"]').first().text());
    const onIndex = dateText.lastIndexOf(' on ');

    // Identical short reviews are common, so the block's place on the page keeps their ids apart.
    const reviewId = review.attr('id')?.trim();
    const record = toRawRecord({
      id: reviewId ? `${productId}:${reviewId}` : checksumFrom({ productId, position, text }).slice(0, 32),
      platform: 'marketplace',
      text,
      timestamp: parseTimestamp(onIndex >= 0 ? dateText.slice(onIndex + 4) : dateText),
      author: author || 'Marketplace Customer',
      engagement: Number.isFinite(rating) ? rating : undefined,
      metadata: compactMetadata({ productId, product: productTitle }),
    });
    if (record) {
      records.push(record);
    }
  }
  return records;
}

/**
 * Product reviews scraped from search and product pages: search for the query, then read the
 * review widget of each listed product until `limit` reviews are collected.
 */
export class MarketplaceCollector implements Collector {
  readonly platform = 'marketplace' as const;
  private readonly baseUrl: string;
  private readonly maxProducts: number;
  private readonly requestSpacingMs: number;
  private readonly maxRetries: number;
  private readonly retryBackoffMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger | undefined;

  constructor(options: MarketplaceCollectorOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.maxProducts = options.maxProducts ?? 8;
    this.requestSpacingMs = options.requestSpacingMs ?? 2000;
    this.maxRetries = options.maxRetries ?? 2;
    this.retryBackoffMs = options.retryBackoffMs ?? 5000;
    this.fetchImpl = options.fetchImpl;
    this.logger = options.logger;
  }

  async *fetch(query: string, limit: number, options: CollectOptions = {}): AsyncGenerator<RawRecord> {
    assertLimit(limit);
    const searchResponse = await this.get(`${this.baseUrl}/s?k=${encodeURIComponent(query)}`, options.signal);
    if (searchResponse.status !== 200) {
      throw new CollectionError('marketplace', `Marketplace search returned status ${searchResponse.status}`);
    }

    const productIds = parseSearchResults(await searchResponse.text()).slice(0, this.maxProducts);
    if (productIds.length === 0) {
      this.logger?.(`No products found for "${query}"`);
      return;
    }
    this.logger?.(`Found ${productIds.length} products, reading reviews...`);

    let yielded = 0;
    for (const [index, productId] of productIds.entries()) {
      if (index > 0) {
        await sleep(this.requestSpacingMs, options.signal);
      }

      let reviews: RawRecord[];
      try {
        const response = await this.get(`${this.baseUrl}/dp/${productId}`, options.signal);
        if (response.status !== 200) {
          this.logger?.(`Skipping product ${productId}: status ${response.status}`);
          continue;
        }
        reviews = parseProductReviews(await response.text(), productId);
      } catch (error) {
        if (options.signal?.aborted) {
          throw error;
        }
        this.logger?.(`Skipping product ${productId}: ${describeError(error)}`);
        continue;
      }

      for (const review of reviews) {
        yield review;
        yielded += 1;
        if (yielded >= limit) {
          this.logger?.(`Collected ${yielded} reviews for "${query}"`);
          return;
        }
      }
    }

    this.logger?.(`Collected ${yielded} reviews for "${query}"`);
  }

  private get(url: string, signal: AbortSignal | undefined): Promise<Response> {
    return fetchWithBackoff(
      url,
      { headers: { ...BROWSER_HEADERS } },
      {
        maxRetries: this.maxRetries,
        retryBackoffMs: this.retryBackoffMs,
        retryStatuses: [429, 503],
        fetchImpl: this.fetchImpl,
        logger: this.logger,
        signal,
      },
    );
  }
}
