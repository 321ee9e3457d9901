/**
 * @fileoverview In-memory TTL cache for On This Day responses.
 *
 * Stores the outcome of each fetch, failures included, under the
 * (language, category, month, day) key. Expiry is checked on read; there is
 * no size-based eviction, as the key space is small.
 *
 * Not safe for concurrent writers across processes; OnThisDayService
 * serializes fetches per key within one process.
 */

import type { FeedRequest } from '@daybook/contracts';
import type { CacheStats, FeedOutcome, ResponseCacheOptions } from './types.js';

/**
 * Default entry lifetime: 24 hours.
 */
export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;

interface CacheEntry {
  outcome: FeedOutcome;
  expiresAt: number;
}

/**
 * Generate a string key from a feed request.
 *
 * Format: {language}:{category}:{month}:{day}
 * Example: "de:births:2:29"
 */
export function serializeFeedKey(request: FeedRequest): string {
  return `${request.language}:${request.category}:${request.month}:${request.day}`;
}

export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;
  private stats: CacheStats = {
    hits: 0,
    misses: 0,
    expirations: 0,
    sets: 0,
    keys: 0,
  };

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  /**
   * Returns the live outcome for a request, or null on a miss.
   * An expired entry is removed and counted as a miss.
   */
  get(request: FeedRequest): FeedOutcome | null {
    const key = serializeFeedKey(request);
    const entry = this.entries.get(key);

    if (!entry) {
      this.stats.misses++;
      return null;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.stats.keys--;
      this.stats.expirations++;
      this.stats.misses++;
      return null;
    }

    this.stats.hits++;
    return entry.outcome;
  }

  /**
   * Stores an outcome, replacing any previous entry for the key.
   */
  set(request: FeedRequest, outcome: FeedOutcome): void {
    const key = serializeFeedKey(request);

    if (!this.entries.has(key)) {
      this.stats.keys++;
    }

    this.entries.set(key, { outcome, expiresAt: this.now() + this.ttlMs });
    this.stats.sets++;
  }

  delete(request: FeedRequest): boolean {
    const removed = this.entries.delete(serializeFeedKey(request));
    if (removed) {
      this.stats.keys--;
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.stats.keys = 0;
  }

  size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return { ...this.stats };
  }
}
