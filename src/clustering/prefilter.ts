/**
 * Cheap gate in front of the equivalence oracle.
 *
 * Compares the leading characters of the first content word (the verb,
 * once a leading "to" is dropped). A prefix length of 0 disables the gate.
 */

function leadingWord(phrase: string): string {
  const words = phrase.trim().toLowerCase().split(/\s+/);
  const start = words[0] === "to" && words.length > 1 ? 1 : 0;
  return words[start] ?? "";
}

export function sharesPrefix(
  a: string,
  b: string,
  prefixLength: number,
): boolean {
  if (prefixLength <= 0) {
    return true;
  }

  const wordA = leadingWord(a);
  const wordB = leadingWord(b);
  if (wordA.length === 0 || wordB.length === 0) {
    return true;
  }

  return wordA.slice(0, prefixLength) === wordB.slice(0, prefixLength);
}
