/**
 * Taxonomy Classifier
 *
 * Assigns each cluster representative a three-level category path.
 * The oracle is asked first; anything it returns that does not match
 * "Category|Subcategory|Specific" falls through to the keyword rules.
 */

import { OracleCache } from "@/caching";
import type { TextOracle } from "@/oracle";
import type { TaxonomyPath } from "@/types";
import { type KeywordRule, KEYWORD_RULES, ruleTaxonomy } from "./rules";

const TAXONOMY_PROMPT = `Categorize the life goal "{{phrase}}" into 3 levels.
Reply ONLY with the format: Category|Subcategory|Specific`;

const PATH_PATTERN = /^([A-Za-z ]+)\|([A-Za-z ]+)\|([A-Za-z ]+)$/;

export interface TaxonomyClassifierOptions {
  cache?: OracleCache<TaxonomyPath>;
  rules?: readonly KeywordRule[];
  maxTokens?: number;
}

/**
 * Extract a path from the first answer line made of exactly three
 * letter-and-space segments, or null when no line fits
 */
export function parseTaxonomyResponse(response: string): TaxonomyPath | null {
  for (const line of response.split(/\r?\n/)) {
    const match = line.trim().match(PATH_PATTERN);
    if (!match) continue;

    const [level1, level2, level3] = [match[1], match[2], match[3]].map((s) =>
      s.trim().replace(/\s+/g, " "),
    );
    if (level1 && level2 && level3) {
      return { level1, level2, level3, source: "oracle" };
    }
  }
  return null;
}

export class TaxonomyClassifier {
  private cache: OracleCache<TaxonomyPath>;
  private rules: readonly KeywordRule[];
  private maxTokens: number;
  private oracleCalls = 0;

  constructor(
    private oracle: TextOracle | null,
    options: TaxonomyClassifierOptions = {},
  ) {
    this.cache = options.cache ?? new OracleCache<TaxonomyPath>();
    this.rules = options.rules ?? KEYWORD_RULES;
    this.maxTokens = options.maxTokens ?? 100;
  }

  get callCount(): number {
    return this.oracleCalls;
  }

  /**
   * Total: every input, including empty strings, gets three non-empty levels
   */
  async classify(representative: string): Promise<TaxonomyPath> {
    if (!this.oracle || representative.trim().length === 0) {
      return ruleTaxonomy(representative, this.rules);
    }

    const cached = this.cache.get("taxonomy", representative);
    if (cached !== undefined) {
      return { ...cached };
    }

    let response: string;
    try {
      this.oracleCalls++;
      response = await this.oracle.complete(
        TAXONOMY_PROMPT.replace("{{phrase}}", () => representative),
        { temperature: 0.1, maxTokens: this.maxTokens },
      );
    } catch (error) {
      console.warn("[dreamgroup] Taxonomy oracle failed:", error);
      return ruleTaxonomy(representative, this.rules);
    }

    const parsed = parseTaxonomyResponse(response);
    const path = parsed ?? ruleTaxonomy(representative, this.rules);
    if (!parsed) {
      console.warn(
        `[dreamgroup] Unusable taxonomy for "${representative}", using keyword rules`,
      );
    }

    this.cache.set("taxonomy", representative, path);
    return { ...path };
  }
}
