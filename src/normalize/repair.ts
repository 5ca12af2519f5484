/**
 * Repair rules for free-form normalization output
 *
 * Each rule recognises one shape the oracle tends to answer in and pulls the
 * phrase out of it. Rules run in order; the first one whose extracted phrase
 * survives `finishPhrase` wins.
 */

import { containsHebrew } from "./script";

export interface ResponseRepairRule {
  readonly name: string;
  matches(text: string): boolean;
  extract(text: string): string | null;
}

export interface RepairedPhrase {
  phrase: string;
  rule: string;
}

const MIN_PHRASE_LENGTH = 3;

const LABEL_PATTERN =
  /(?:^|\s)(?:to\s+)?(?:normalized|translation|english|simplified|answer)\s*:/gi;

function firstLine(text: string): string | null {
  const line = text
    .split(/\r?\n/)
    .map((l) => l.trim())
    .find((l) => l.length > 0);
  return line ?? null;
}

function firstSpanWithoutHebrew(text: string, pattern: RegExp): string | null {
  for (const match of text.matchAll(pattern)) {
    const span = match[1];
    if (span && span.trim().length > 0 && !containsHebrew(span)) {
      return span;
    }
  }
  return null;
}

export const strictRule: ResponseRepairRule = {
  name: "strict",
  matches: (text) => /^to\s+[^\n"“”*:→=–]+$/i.test(text.trim()),
  extract: (text) => text.trim(),
};

export const labelPrefixRule: ResponseRepairRule = {
  name: "label-prefix",
  matches: (text) => new RegExp(LABEL_PATTERN.source, "i").test(text),
  extract: (text) => {
    let end = -1;
    for (const match of text.matchAll(LABEL_PATTERN)) {
      end = (match.index ?? 0) + match[0].length;
    }
    return end >= 0 ? firstLine(text.slice(end)) : null;
  },
};

export const arrowTailRule: ResponseRepairRule = {
  name: "arrow-tail",
  matches: (text) => /[→=–]/.test(text),
  extract: (text) => {
    const segments = text.split(/[→=–]/);
    const tail = segments[segments.length - 1];
    return tail === undefined ? null : firstLine(tail);
  },
};

export const emphasisRule: ResponseRepairRule = {
  name: "emphasis",
  matches: (text) => /\*[^*\n]+\*/.test(text),
  extract: (text) => firstSpanWithoutHebrew(text, /\*([^*\n]+)\*/g),
};

export const quotedRule: ResponseRepairRule = {
  name: "quoted",
  matches: (text) => /["“”][^"“”\n]+["“”]/.test(text),
  extract: (text) => firstSpanWithoutHebrew(text, /["“”]([^"“”\n]+)["“”]/g),
};

export const firstLineRule: ResponseRepairRule = {
  name: "first-line",
  matches: (text) => text.trim().length > 0,
  extract: firstLine,
};

export const DEFAULT_REPAIR_RULES: readonly ResponseRepairRule[] = [
  strictRule,
  labelPrefixRule,
  arrowTailRule,
  emphasisRule,
  quotedRule,
  firstLineRule,
];

/**
 * Prefix "to " unless the phrase already has it or opens with an article.
 */
export function ensureToPrefix(phrase: string): string {
  if (/^(to|a|the)\s/.test(phrase) || phrase === "to") {
    return phrase;
  }
  return `to ${phrase}`;
}

/**
 * Shared cleanup applied to every extracted candidate.
 */
export function finishPhrase(candidate: string): string {
  const cleaned = candidate
    .replace(/\([^)]*\)/g, " ")
    .replace(/^[\s"'“”‘’*`]+/, "")
    .replace(/[\s"'“”‘’*`.!]+$/, "")
    .toLowerCase()
    .replace(/\s+/g, " ")
    .replace(/\bto(?:\s+to)+\b/g, "to")
    .trim();

  return cleaned.length > 0 ? ensureToPrefix(cleaned) : "";
}

function isAcceptable(phrase: string): boolean {
  return phrase.length >= MIN_PHRASE_LENGTH && !containsHebrew(phrase);
}

/**
 * Run the rules in order and return the first acceptable phrase, or null
 * when nothing usable can be recovered.
 */
export function repairResponse(
  response: string,
  rules: readonly ResponseRepairRule[] = DEFAULT_REPAIR_RULES,
): RepairedPhrase | null {
  const text = response.trim();
  if (text.length === 0) {
    return null;
  }

  for (const rule of rules) {
    if (!rule.matches(text)) continue;

    const extracted = rule.extract(text);
    if (!extracted) continue;

    const phrase = finishPhrase(extracted);
    if (isAcceptable(phrase)) {
      return { phrase, rule: rule.name };
    }
  }

  return null;
}
