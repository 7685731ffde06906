import type { OnlinePlatform } from '../types/index.js';
import { createLogger, type Logger } from '../utils/logger.js';
import type { Collector } from './collector.js';
import type { FetchLike } from './http.js';
import { MarketplaceCollector } from './marketplace.js';
import { RedditCollector } from './reddit.js';
import { SocialXCollector } from './socialX.js';

export type { CollectOptions, Collector } from './collector.js';
export type { FetchLike } from './http.js';

export interface CollectorSettings {
  socialXCredential?: string | undefined;
  /** Delay between consecutive requests of one platform; each platform keeps its default when unset. */
  requestSpacingMs?: number | undefined;
  fetchImpl?: FetchLike | undefined;
  loggerFor?: (platform: OnlinePlatform) => Logger;
}

export type CollectorFactory = (platform: OnlinePlatform) => Collector;

/** Throws `ConfigurationError` when the platform is missing what it needs. */
export function createCollector(platform: OnlinePlatform, settings: CollectorSettings = {}): Collector {
  const logger = settings.loggerFor?.(platform) ?? createLogger('collector', platform);
  const shared = {
    logger,
    ...(settings.fetchImpl ? { fetchImpl: settings.fetchImpl } : {}),
    ...(settings.requestSpacingMs !== undefined ? { requestSpacingMs: settings.requestSpacingMs } : {}),
  };

  switch (platform) {
    case 'reddit':
      return new RedditCollector(shared);
    case 'social-x':
      return new SocialXCollector({ ...shared, bearerToken: settings.socialXCredential });
    case 'marketplace':
      return new MarketplaceCollector(shared);
  }
}

export function collectorFactory(settings: CollectorSettings = {}): CollectorFactory {
  return (platform) => createCollector(platform, settings);
}
