/**
 * @fileoverview Provider-specific types for the On This Day feed.
 *
 * @module @daybook/provider-wikipedia/types
 */

import type { AxiosInstance } from 'axios';
import type { FeedRequest, OnThisDayResponse } from '@daybook/contracts';
import type { Logger } from '@daybook/logger';

/**
 * Anything that can fetch one feed; implemented by OnThisDayClient.
 */
export interface FeedFetcher {
  fetchFeed(request: FeedRequest): Promise<OnThisDayResponse>;
}

/**
 * Options for OnThisDayClient.
 */
export interface OnThisDayClientOptions {
  /**
   * Replaces `https://{language}.wikipedia.org` for every language, e.g. a
   * local mock server. Must be an absolute http(s) URL.
   */
  baseUrl?: string;

  /**
   * Request timeout in milliseconds.
   * @default 10000
   */
  timeoutMs?: number;

  /**
   * Identifying User-Agent header.
   * @default 'daybook/0.1.0'
   */
  userAgent?: string;

  /**
   * Pre-configured axios instance (tests inject one with a custom adapter).
   */
  httpClient?: AxiosInstance;

  logger?: Logger;
}

/**
 * Result of one fetch, as stored in the cache. Failures are stored too.
 */
export type FeedOutcome =
  | { ok: true; response: OnThisDayResponse }
  | { ok: false; error: Error };

/**
 * Counters exposed by ResponseCache.
 */
export interface CacheStats {
  hits: number;
  misses: number;
  expirations: number;
  sets: number;
  keys: number;
}

export interface ResponseCacheOptions {
  /**
   * Entry lifetime in milliseconds.
   * @default 86400000 (24 hours)
   */
  ttlMs?: number;

  /**
   * Clock in epoch milliseconds.
   * @default Date.now
   */
  now?: () => number;
}
