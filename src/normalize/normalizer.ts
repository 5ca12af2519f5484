/**
 * Text normalizer
 *
 * Reduces a raw dream title (any script) to a canonical English phrase of
 * the form "to <verb> <object>". The oracle is asked first; anything it
 * cannot deliver is replaced by a deterministic fallback so every record
 * ends up with a phrase.
 */

import { OracleCache } from "@/caching";
import type { TextOracle } from "@/oracle";
import { buildNormalizePrompt } from "./prompts";
import {
  DEFAULT_REPAIR_RULES,
  type ResponseRepairRule,
  repairResponse,
} from "./repair";
import { detectScript, type SourceScript } from "./script";

export type NormalizeSource = "oracle" | "fallback";

export interface NormalizeResult {
  phrase: string;
  source: NormalizeSource;
  script: SourceScript;
  /** Repair rule that recovered the phrase (oracle results only) */
  rule?: string;
}

export interface TextNormalizerOptions {
  temperature?: number;
  maxTokens?: number;
  rules?: readonly ResponseRepairRule[];
  cache?: OracleCache<NormalizeResult>;
}

const DEFAULT_TEMPERATURE = 0.1;
const DEFAULT_MAX_TOKENS = 100;

/**
 * Deterministic fallback: the original phrase, lower-cased, with "to ".
 */
export function fallbackPhrase(raw: string): string {
  const clean = raw.trim().replace(/\s+/g, " ").toLowerCase();
  return clean.startsWith("to ") ? clean : `to ${clean}`;
}

export class TextNormalizer {
  private temperature: number;
  private maxTokens: number;
  private rules: readonly ResponseRepairRule[];
  private cache: OracleCache<NormalizeResult>;
  private oracleCalls = 0;

  constructor(
    private oracle: TextOracle | null,
    options: TextNormalizerOptions = {},
  ) {
    this.temperature = options.temperature ?? DEFAULT_TEMPERATURE;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.rules = options.rules ?? DEFAULT_REPAIR_RULES;
    this.cache = options.cache ?? new OracleCache<NormalizeResult>();
  }

  /**
   * Number of oracle requests issued by this normalizer
   */
  get callCount(): number {
    return this.oracleCalls;
  }

  async normalize(raw: string): Promise<string> {
    const result = await this.normalizeDetailed(raw);
    return result.phrase;
  }

  async normalizeDetailed(raw: string): Promise<NormalizeResult> {
    if (raw.trim().length === 0) {
      throw new Error("Cannot normalize an empty title");
    }

    return this.cache.getOrCompute("normalize", raw, () =>
      this.computeNormalization(raw),
    );
  }

  private async computeNormalization(raw: string): Promise<NormalizeResult> {
    const script = detectScript(raw);
    const fallback: NormalizeResult = {
      phrase: fallbackPhrase(raw),
      source: "fallback",
      script,
    };

    if (!this.oracle) {
      return fallback;
    }

    let response: string;
    try {
      this.oracleCalls++;
      response = await this.oracle.complete(
        buildNormalizePrompt(raw.trim(), script),
        { temperature: this.temperature, maxTokens: this.maxTokens },
      );
    } catch (error) {
      console.warn(
        "[dreamgroup] Normalization call failed, using fallback:",
        error,
      );
      return fallback;
    }

    const repaired = repairResponse(response, this.rules);
    if (!repaired) {
      console.warn(
        `[dreamgroup] Unusable normalization output for "${raw.trim()}", using fallback`,
      );
      return fallback;
    }

    return {
      phrase: repaired.phrase,
      source: "oracle",
      script,
      rule: repaired.rule,
    };
  }
}
