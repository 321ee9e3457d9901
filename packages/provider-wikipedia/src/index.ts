/**
 * @fileoverview Public API for @daybook/provider-wikipedia.
 *
 * Fetches the Wikipedia "On This Day" feed for a language, category and
 * date, with a cache-first service on top.
 *
 * @module @daybook/provider-wikipedia
 * @example
 * ```typescript
 * import { OnThisDayClient, OnThisDayService } from '@daybook/provider-wikipedia';
 * import { Category } from '@daybook/contracts';
 *
 * const service = new OnThisDayService({ client: new OnThisDayClient() });
 * const feed = await service.getFeed({
 *   language: 'en',
 *   category: Category.Events,
 *   month: 2,
 *   day: 29,
 * });
 * ```
 */

export { OnThisDayClient, createClient, DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './client.js';
export { OnThisDayService } from './service.js';
export type { OnThisDayServiceConfig } from './service.js';
export { ResponseCache, serializeFeedKey, DEFAULT_CACHE_TTL_MS } from './cache.js';
export { decodeOnThisDay, onThisDaySchema } from './parser.js';
export { buildFeedUrl, defaultBaseUrl, normalizeBaseUrl, FEED_PATH } from './url.js';

export type {
  FeedFetcher,
  FeedOutcome,
  CacheStats,
  OnThisDayClientOptions,
  ResponseCacheOptions,
} from './types.js';
