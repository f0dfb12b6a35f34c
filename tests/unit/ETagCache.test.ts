/**
 * ETagCache Unit Tests
 *
 * TTL expiration, eviction at capacity and key separation.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ETagCache } from '../../src/core/http/ETagCache';
import type { ETagKey, HttpResponse } from '../../src/core/http/types';

const pullsKey: ETagKey = { provider: 'github', resource: 'acme/widgets:pulls_main_p1_n100' };

function response(data: unknown): HttpResponse {
  return { data, status: 200, headers: { 'content-type': 'application/json' } };
}

describe('ETagCache', () => {
  let cache: ETagCache;

  beforeEach(() => {
    cache = new ETagCache();
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('Basic Cache Operations', () => {
    it('should store and retrieve cached data', () => {
      const payload = response([{ id: 1 }]);
      cache.set(pullsKey, payload, 'W/"abc123"');

      const cached = cache.get(pullsKey);
      expect(cached?.etag).toBe('W/"abc123"');
      expect(cached?.payload).toEqual(payload);
      expect(cached?.timestamp).toBeTypeOf('number');
    });

    it('should return undefined for a key never stored', () => {
      expect(cache.get(pullsKey)).toBeUndefined();
    });

    it.each([undefined, ''])('should not store responses with ETag %o', (etag) => {
      cache.set(pullsKey, response([]), etag);
      expect(cache.get(pullsKey)).toBeUndefined();
    });

    it('should replace an entry on a newer ETag', () => {
      cache.set(pullsKey, response([{ id: 1 }]), '"v1"');
      cache.set(pullsKey, response([{ id: 2 }]), '"v2"');

      expect(cache.get(pullsKey)?.etag).toBe('"v2"');
      expect(cache.get(pullsKey)?.payload.data).toEqual([{ id: 2 }]);
    });
  });

  describe('TTL Expiration', () => {
    it('should drop entries past the TTL', () => {
      const now = 1_700_000_000_000;
      vi.spyOn(Date, 'now').mockReturnValue(now);
      cache.set(pullsKey, response([]), '"v1"');

      vi.spyOn(Date, 'now').mockReturnValue(now + cache.ttl + 1);
      expect(cache.get(pullsKey)).toBeUndefined();
    });

    it('should keep entries at the TTL boundary', () => {
      const now = 1_700_000_000_000;
      vi.spyOn(Date, 'now').mockReturnValue(now);
      cache.set(pullsKey, response([]), '"v1"');

      vi.spyOn(Date, 'now').mockReturnValue(now + cache.ttl);
      expect(cache.get(pullsKey)?.etag).toBe('"v1"');
    });
  });

  describe('Cache Eviction at Capacity', () => {
    it('should evict the oldest entry when full', () => {
      for (let page = 1; page <= 100; page++) {
        cache.set({ provider: 'github', resource: `page-${page}` }, response([]), `"${page}"`);
      }

      cache.set({ provider: 'github', resource: 'page-101' }, response([]), '"101"');

      expect(cache.get({ provider: 'github', resource: 'page-1' })).toBeUndefined();
      expect(cache.get({ provider: 'github', resource: 'page-2' })?.etag).toBe('"2"');
      expect(cache.get({ provider: 'github', resource: 'page-101' })?.etag).toBe('"101"');
    });

    it('should not evict when overwriting an existing key at capacity', () => {
      for (let page = 1; page <= 100; page++) {
        cache.set({ provider: 'github', resource: `page-${page}` }, response([]), `"${page}"`);
      }

      cache.set({ provider: 'github', resource: 'page-50' }, response([]), '"50b"');

      expect(cache.get({ provider: 'github', resource: 'page-1' })?.etag).toBe('"1"');
      expect(cache.get({ provider: 'github', resource: 'page-50' })?.etag).toBe('"50b"');
    });
  });

  describe('Cache Key Creation', () => {
    it('should separate providers and resources', () => {
      cache.set(pullsKey, response([]), '"pulls"');
      cache.set({ provider: 'openai', resource: pullsKey.resource }, response([]), '"openai"');
      cache.set({ provider: 'github', resource: 'acme/widgets:releases_p1_n100' }, response([]), '"rel"');

      expect(cache.get(pullsKey)?.etag).toBe('"pulls"');
      expect(cache.get({ provider: 'openai', resource: pullsKey.resource })?.etag).toBe('"openai"');
      expect(cache.get({ provider: 'github', resource: 'acme/widgets:releases_p1_n100' })?.etag).toBe('"rel"');
    });
  });
});
