import { describe, expect, it } from "vitest";
import {
  characterSimilarity,
  levenshteinDistance,
  lexicalSimilarity,
  tokenJaccard,
  tokenize,
} from "../../search";

describe("levenshteinDistance", () => {
  it("should count edits", () => {
    expect(levenshteinDistance("kitten", "sitting")).toBe(3);
    expect(levenshteinDistance("sitting", "kitten")).toBe(3);
    expect(levenshteinDistance("fly", "fly")).toBe(0);
  });

  it("should handle empty strings", () => {
    expect(levenshteinDistance("", "abc")).toBe(3);
    expect(levenshteinDistance("abc", "")).toBe(3);
    expect(levenshteinDistance("", "")).toBe(0);
  });
});

describe("characterSimilarity", () => {
  it("should scale by the longer string", () => {
    expect(characterSimilarity("kitten", "sitting")).toBeCloseTo(4 / 7, 10);
  });

  it("should treat two empty strings as identical", () => {
    expect(characterSimilarity("", "")).toBe(1);
  });
});

describe("tokenize", () => {
  it("should lower-case and dedupe tokens", () => {
    expect(Array.from(tokenize("  To fly TO  the moon "))).toEqual([
      "to",
      "fly",
      "the",
      "moon",
    ]);
  });
});

describe("tokenJaccard", () => {
  it("should divide shared tokens by the union", () => {
    expect(tokenJaccard("to fly high", "to fly")).toBeCloseTo(2 / 3, 10);
    expect(tokenJaccard("to fly", "swim")).toBe(0);
  });

  it("should treat two empty phrases as identical", () => {
    expect(tokenJaccard("", "  ")).toBe(1);
  });
});

describe("lexicalSimilarity", () => {
  it("should score identical phrases 100 regardless of case", () => {
    expect(lexicalSimilarity("To Fly ", "to fly")).toBe(100);
  });

  it("should blend token and character similarity", () => {
    // jaccard 1/3, characters 1 - 4/7
    expect(lexicalSimilarity("to fly", "to swim")).toBeCloseTo(
      (0.6 / 3 + (0.4 * 3) / 7) * 100,
      8,
    );
    // jaccard 2/3, characters 1 - 5/11
    expect(lexicalSimilarity("to fly", "to fly high")).toBeCloseTo(
      (0.4 + (0.4 * 6) / 11) * 100,
      8,
    );
  });
});
