/**
 * Oracle result cache
 *
 * Memoizes oracle verdicts by (operation kind, canonical input). Within a
 * single pipeline run the cache is unbounded; a long-lived server can cap
 * it with LRU eviction and a TTL.
 */

import type { CacheConfig } from "@/types";
import { oracleCacheKey } from "./cache-key";
import type { CacheEntry, CacheStats, OracleOperation } from "./types";

/**
 * Map-backed cache; insertion order doubles as LRU order.
 */
export class OracleCache<T> {
  private cache = new Map<string, CacheEntry<T>>();
  private config: CacheConfig;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(
    config: CacheConfig = {},
    private now: () => number = Date.now,
  ) {
    this.config = { ...config };
  }

  /**
   * Cached value for the input, or undefined on a miss or expired entry.
   */
  get(
    kind: OracleOperation,
    input: string | readonly [string, string],
  ): T | undefined {
    const key = oracleCacheKey(kind, input);
    const entry = this.cache.get(key);

    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (this.isExpired(entry)) {
      this.cache.delete(key);
      this.stats.evictions++;
      this.stats.misses++;
      return undefined;
    }

    // Move to end of Map (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);

    this.stats.hits++;
    return entry.value;
  }

  set(
    kind: OracleOperation,
    input: string | readonly [string, string],
    value: T,
  ): void {
    const key = oracleCacheKey(kind, input);

    if (this.cache.has(key)) {
      this.cache.delete(key);
    }

    const { maxEntries } = this.config;
    if (maxEntries !== undefined) {
      while (this.cache.size >= maxEntries) {
        const oldestKey = this.cache.keys().next().value;
        if (oldestKey === undefined) break;
        this.cache.delete(oldestKey);
        this.stats.evictions++;
      }
    }

    this.cache.set(key, { key, value, createdAt: this.now() });
  }

  /**
   * Return the cached value, or compute, store and return it.
   * A rejected computation is not cached.
   */
  async getOrCompute(
    kind: OracleOperation,
    input: string | readonly [string, string],
    compute: () => Promise<T>,
  ): Promise<T> {
    const cached = this.get(kind, input);
    if (cached !== undefined) {
      return cached;
    }
    const value = await compute();
    this.set(kind, input, value);
    return value;
  }

  has(
    kind: OracleOperation,
    input: string | readonly [string, string],
  ): boolean {
    const entry = this.cache.get(oracleCacheKey(kind, input));
    return entry !== undefined && !this.isExpired(entry);
  }

  clear(): void {
    this.stats.evictions += this.cache.size;
    this.cache.clear();
  }

  getStats(): CacheStats {
    const totalRequests = this.stats.hits + this.stats.misses;
    return {
      ...this.stats,
      currentEntries: this.cache.size,
      hitRate: totalRequests > 0 ? this.stats.hits / totalRequests : 0,
    };
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return (
      this.config.ttlMs !== undefined &&
      this.now() - entry.createdAt > this.config.ttlMs
    );
  }
}
