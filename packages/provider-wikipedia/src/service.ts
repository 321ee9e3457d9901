/**
 * @fileoverview Cache-first On This Day feed service.
 *
 * Lookup order for a request:
 * 1. A live cache entry, success or failure, is returned without network access
 * 2. A fetch already in flight for the same key is shared
 * 3. Otherwise one fetch is made and its outcome is cached
 *
 * At most one concurrent fetch per key.
 */

import type { FeedRequest, OnThisDayResponse } from '@daybook/contracts';
import { createChildLogger, type Logger } from '@daybook/logger';
import { ResponseCache, serializeFeedKey } from './cache.js';
import type { FeedFetcher, FeedOutcome } from './types.js';

export interface OnThisDayServiceConfig {
  client: FeedFetcher;

  /**
   * @default a new ResponseCache with the default TTL
   */
  cache?: ResponseCache;

  /**
   * Cache failed fetches for the full TTL as well as successful ones.
   * @default true
   */
  cacheFailures?: boolean;

  logger?: Logger;
}

export class OnThisDayService {
  private readonly client: FeedFetcher;
  private readonly cache: ResponseCache;
  private readonly cacheFailures: boolean;
  private readonly logger?: Logger;
  private readonly inFlight = new Map<string, Promise<FeedOutcome>>();

  constructor(config: OnThisDayServiceConfig) {
    this.client = config.client;
    this.cache = config.cache ?? new ResponseCache();
    this.cacheFailures = config.cacheFailures ?? true;
    this.logger = config.logger
      ? createChildLogger(config.logger, { component: 'onthisday-service' })
      : undefined;
  }

  /**
   * Returns the decoded feed for a request.
   *
   * @throws The fetch error, or the cached error of an earlier failed fetch
   */
  async getFeed(request: FeedRequest): Promise<OnThisDayResponse> {
    const outcome = await this.resolve(request);
    if (outcome.ok) {
      return outcome.response;
    }
    throw outcome.error;
  }

  private resolve(request: FeedRequest): Promise<FeedOutcome> {
    const key = serializeFeedKey(request);

    const cached = this.cache.get(request);
    if (cached) {
      this.logger?.debug('Cache hit', { key, cache: 'hit', ok: cached.ok });
      return Promise.resolve(cached);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      this.logger?.debug('Joining in-flight request', { key });
      return pending;
    }

    this.logger?.debug('Cache miss', { key, cache: 'miss' });
    const started = this.fetchOutcome(request).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, started);
    return started;
  }

  private async fetchOutcome(request: FeedRequest): Promise<FeedOutcome> {
    let outcome: FeedOutcome;

    try {
      outcome = { ok: true, response: await this.client.fetchFeed(request) };
    } catch (error) {
      outcome = { ok: false, error: error instanceof Error ? error : new Error(String(error)) };
      this.logger?.warn('On This Day fetch failed', {
        key: serializeFeedKey(request),
        error: outcome.error.message,
        cached: this.cacheFailures,
      });
    }

    if (outcome.ok || this.cacheFailures) {
      this.cache.set(request, outcome);
    }

    return outcome;
  }
}
