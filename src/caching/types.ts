/**
 * Oracle cache types and Zod schemas
 */

import { z } from "zod";

// ============================================
// Operation kinds
// ============================================

export const OracleOperationSchema = z.enum([
  "normalize",
  "equivalence",
  "taxonomy",
]);
export type OracleOperation = z.infer<typeof OracleOperationSchema>;

// ============================================
// Cache Entry
// ============================================

export interface CacheEntry<T> {
  key: string;
  value: T;
  /** When the entry was created (Unix timestamp ms) */
  createdAt: number;
}

// ============================================
// Cache Statistics
// ============================================

export interface CacheStats {
  hits: number;
  misses: number;
  /** Entries dropped by LRU capacity or TTL */
  evictions: number;
  currentEntries: number;
  /** Cache hit rate (0-1) */
  hitRate: number;
}
