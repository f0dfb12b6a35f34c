// src/core/http/ETagCache.ts

import type { ETagKey, HttpResponse } from './types';

interface CachedETagData {
  etag: string;
  payload: HttpResponse;
  timestamp: number;
}

/**
 * Last response per GitHub list resource. Only pays off in `--watch` mode,
 * where a 304 does not count against the REST rate limit.
 */
export class ETagCache {
  private cache: Map<string, CachedETagData> = new Map();
  private maxSize = 100;
  public ttl = 3600000; // 1 hour

  get(key: ETagKey): CachedETagData | undefined {
    const cacheKey = this.createKey(key);
    const cached = this.cache.get(cacheKey);

    if (!cached) return undefined;

    if (Date.now() - cached.timestamp > this.ttl) {
      this.cache.delete(cacheKey);
      return undefined;
    }

    return cached;
  }

  set(key: ETagKey, payload: HttpResponse, etag: string | undefined): void {
    if (!etag) return;

    const cacheKey = this.createKey(key);

    // Evict oldest if at capacity
    if (this.cache.size >= this.maxSize && !this.cache.has(cacheKey)) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(cacheKey, {
      etag,
      payload,
      timestamp: Date.now(),
    });
  }

  private createKey(key: ETagKey): string {
    return `${key.provider}:${key.resource}`;
  }
}
