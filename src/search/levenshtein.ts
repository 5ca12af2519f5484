/**
 * Edit-distance similarity for the lexical search tier
 */

/**
 * Levenshtein distance between two strings, single-row DP
 */
export function levenshteinDistance(a: string, b: string): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;

  // Keep the row as short as the shorter string
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const row = new Array<number>(a.length + 1);
  for (let i = 0; i <= a.length; i++) {
    row[i] = i;
  }

  for (let j = 1; j <= b.length; j++) {
    let diagonal = row[0];
    row[0] = j;
    for (let i = 1; i <= a.length; i++) {
      const above = row[i];
      row[i] =
        a[i - 1] === b[j - 1]
          ? diagonal
          : Math.min(diagonal + 1, row[i - 1] + 1, above + 1);
      diagonal = above;
    }
  }

  return row[a.length];
}

/**
 * 1 - distance / longer length; 1 for identical (or two empty) strings
 */
export function characterSimilarity(a: string, b: string): number {
  if (a === b) return 1;

  const maxLen = Math.max(a.length, b.length);
  if (maxLen === 0) return 1;

  return 1 - levenshteinDistance(a, b) / maxLen;
}
