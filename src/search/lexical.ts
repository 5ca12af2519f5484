import { characterSimilarity } from "./levenshtein";

const TOKEN_WEIGHT = 0.6;
const CHARACTER_WEIGHT = 0.4;

export function tokenize(phrase: string): Set<string> {
  return new Set(
    phrase
      .toLowerCase()
      .split(/\s+/)
      .filter((token) => token.length > 0),
  );
}

export function tokenJaccard(a: string, b: string): number {
  const tokensA = tokenize(a);
  const tokensB = tokenize(b);
  if (tokensA.size === 0 && tokensB.size === 0) return 1;

  let shared = 0;
  for (const token of tokensA) {
    if (tokensB.has(token)) shared++;
  }
  return shared / (tokensA.size + tokensB.size - shared);
}

/**
 * Blend of token overlap and edit distance, scaled to 0-100
 */
export function lexicalSimilarity(a: string, b: string): number {
  const left = a.trim().toLowerCase();
  const right = b.trim().toLowerCase();
  const score =
    TOKEN_WEIGHT * tokenJaccard(left, right) +
    CHARACTER_WEIGHT * characterSimilarity(left, right);
  return score * 100;
}
