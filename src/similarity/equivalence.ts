/**
 * Pairwise equivalence judge
 *
 * Asks the oracle whether two canonical phrases express the same goal.
 * Only a leading "y" counts as agreement; empty, unparseable or failed
 * answers are read as "different".
 */

import { OracleCache } from "@/caching";
import type { TextOracle } from "@/oracle";

const EQUIVALENCE_PROMPT = `Are these two life goals essentially the same goal? "{{a}}" and "{{b}}"
Reply with ONLY "y" for yes or "n" for no.`;

export interface EquivalenceJudgeOptions {
  cache?: OracleCache<boolean>;
  maxTokens?: number;
}

/**
 * First meaningful token of an answer, lower-cased.
 * Leading quotes, asterisks and punctuation are skipped.
 */
export function firstToken(response: string): string {
  const match = response.toLowerCase().match(/[a-z]+/);
  return match ? match[0] : "";
}

export function parseVerdict(response: string): boolean {
  return firstToken(response).startsWith("y");
}

export class EquivalenceJudge {
  private cache: OracleCache<boolean>;
  private maxTokens: number;
  private oracleCalls = 0;

  constructor(
    private oracle: TextOracle | null,
    options: EquivalenceJudgeOptions = {},
  ) {
    this.cache = options.cache ?? new OracleCache<boolean>();
    this.maxTokens = options.maxTokens ?? 5;
  }

  get callCount(): number {
    return this.oracleCalls;
  }

  async equivalent(a: string, b: string): Promise<boolean> {
    if (a === b) {
      return true;
    }
    if (!this.oracle) {
      return false;
    }

    const cached = this.cache.get("equivalence", [a, b]);
    if (cached !== undefined) {
      return cached;
    }

    const oracle = this.oracle;
    try {
      this.oracleCalls++;
      const response = await oracle.complete(
        EQUIVALENCE_PROMPT.replace("{{a}}", () => a).replace(
          "{{b}}",
          () => b,
        ),
        { temperature: 0, maxTokens: this.maxTokens },
      );
      const verdict = parseVerdict(response);
      this.cache.set("equivalence", [a, b], verdict);
      return verdict;
    } catch (error) {
      console.warn("[dreamgroup] Equivalence check failed:", error);
      return false;
    }
  }
}
