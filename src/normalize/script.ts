/**
 * Script detection by Unicode block
 */

export type SourceScript = "hebrew" | "latin";

const HEBREW_BLOCK = /[\u0590-\u05FF]/;

export function containsHebrew(text: string): boolean {
  return HEBREW_BLOCK.test(text);
}

export function detectScript(text: string): SourceScript {
  return containsHebrew(text) ? "hebrew" : "latin";
}
