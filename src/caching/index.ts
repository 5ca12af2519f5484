/**
 * Oracle caching module exports
 */

export { canonicalPhrase, oracleCacheKey, pairKey } from "./cache-key";
export { OracleCache } from "./oracle-cache";

export type {
  CacheEntry,
  CacheStats,
  OracleOperation,
} from "./types";
