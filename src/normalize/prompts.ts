import type { SourceScript } from "./script";

const HEBREW_PROMPT = `Translate this Hebrew life goal into a short, generic English phrase.
Remove identifying details: names, places, numbers, years and brands.
Keep only the core intent.
Format: "to [verb] [object]"

Examples:
"להתחתן עד גיל 30" → "to get married"
"לקנות דירה בחיפה" → "to buy an apartment"
"לפתוח מסעדה כמו של אבא" → "to open a restaurant"

Hebrew: {{text}}
Reply with ONLY the English phrase:`;

const LATIN_PROMPT = `Reduce this life goal to its core intent.
Remove identifying details: names, places, numbers, years and brands.
Format: "to [verb] [object]"

Examples:
"run the Berlin marathon in 2026" → "to run a marathon"
"own 2 apartments in Lisbon" → "to buy property"
"get 500k followers on TikTok" → "to become a content creator"

Input: {{text}}
Reply with ONLY the simplified phrase:`;

export function buildNormalizePrompt(
  text: string,
  script: SourceScript,
): string {
  const template = script === "hebrew" ? HEBREW_PROMPT : LATIN_PROMPT;
  return template.replace("{{text}}", () => text);
}
