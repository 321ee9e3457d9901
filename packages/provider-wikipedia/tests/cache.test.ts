import { describe, it, expect, beforeEach } from 'vitest';
import { Category, emptyOnThisDayResponse, type FeedRequest } from '@daybook/contracts';
import { ResponseCache, serializeFeedKey } from '../src/cache.js';
import type { FeedOutcome } from '../src/types.js';

const request: FeedRequest = { language: 'en', category: Category.Deaths, month: 2, day: 29 };
const success: FeedOutcome = { ok: true, response: emptyOnThisDayResponse() };

describe('ResponseCache', () => {
  let clock: number;
  let cache: ResponseCache;

  beforeEach(() => {
    clock = 0;
    cache = new ResponseCache({ ttlMs: 1000, now: () => clock });
  });

  it('should key by language, category, month and day', () => {
    expect(serializeFeedKey(request)).toBe('en:deaths:2:29');
  });

  it('should return null on a miss', () => {
    expect(cache.get(request)).toBeNull();
    expect(cache.getStats()).toMatchObject({ hits: 0, misses: 1 });
  });

  it('should serve an entry until its TTL has elapsed', () => {
    cache.set(request, success);

    clock = 999;
    expect(cache.get(request)).toBe(success);

    clock = 1000;
    expect(cache.get(request)).toBeNull();
    expect(cache.size()).toBe(0);
    expect(cache.getStats()).toEqual({ hits: 1, misses: 1, expirations: 1, sets: 1, keys: 0 });
  });

  it('should keep failures like successes', () => {
    const failure: FeedOutcome = { ok: false, error: new Error('boom') };
    cache.set(request, failure);

    expect(cache.get(request)).toBe(failure);
  });

  it('should keep keys separate', () => {
    cache.set(request, success);

    expect(cache.get({ ...request, language: 'de' })).toBeNull();
    expect(cache.get({ ...request, category: Category.Births })).toBeNull();
    expect(cache.get({ ...request, day: 28 })).toBeNull();
  });

  it('should restart the TTL when an entry is replaced', () => {
    cache.set(request, success);
    clock = 800;
    cache.set(request, success);

    clock = 1500;
    expect(cache.get(request)).toBe(success);
    expect(cache.getStats().keys).toBe(1);
  });

  it('should delete and clear entries', () => {
    cache.set(request, success);
    expect(cache.delete(request)).toBe(true);
    expect(cache.delete(request)).toBe(false);

    cache.set(request, success);
    cache.clear();
    expect(cache.size()).toBe(0);
    expect(cache.getStats().keys).toBe(0);
  });
});
