/**
 * In-memory TTL cache for forum fetches.
 *
 * Cache Key: sortOrder|timeWindow|limit
 * Invalidation is purely time-based; a stale entry is replaced on next read.
 *
 * @module cmv/fetch-cache
 */

import type { FetchOptions } from "./types";

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export type Clock = () => number;

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: Clock = Date.now,
  ) {}

  get(key: string): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }
    return entry.value;
  }

  set(key: string, value: V): void {
    this.entries.set(key, { value, expiresAt: this.now() + this.ttlMs });
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Wrap an async loader so results are reused per key until the TTL elapses.
 * Rejections are not cached.
 */
export function withTtlCache<A extends unknown[], V>(
  loader: (...args: A) => Promise<V>,
  keyOf: (...args: A) => string,
  cache: TtlCache<V>,
): (...args: A) => Promise<V> {
  return async (...args: A) => {
    const key = keyOf(...args);
    const cached = cache.get(key);
    if (cached !== undefined) {
      console.log(`[FetchCache] HIT ${key}`);
      return cached;
    }
    const value = await loader(...args);
    cache.set(key, value);
    return value;
  };
}

export function fetchCacheKey(options: FetchOptions): string {
  return [options.sortOrder, options.timeWindow, String(options.limit)].join("|");
}
