/**
 * Cache key generation for oracle results
 *
 * A key is the operation kind plus a canonical form of its input, so two
 * calls that must yield the same verdict always land on the same entry.
 */

import type { OracleOperation } from "./types";

/**
 * Canonical form of a single phrase: NFC, trimmed, inner whitespace collapsed.
 * Case is kept; the normalizer's input case can change its output.
 */
export function canonicalPhrase(text: string): string {
  return text.normalize("NFC").trim().replace(/\s+/g, " ");
}

/**
 * Key for an unordered pair, so (a, b) and (b, a) share one entry.
 */
export function pairKey(a: string, b: string): string {
  const pair = [canonicalPhrase(a), canonicalPhrase(b)].sort();
  return JSON.stringify(pair);
}

export function oracleCacheKey(
  kind: OracleOperation,
  input: string | readonly [string, string],
): string {
  const canonical =
    typeof input === "string"
      ? canonicalPhrase(input)
      : pairKey(input[0], input[1]);
  return `${kind}:${canonical}`;
}
