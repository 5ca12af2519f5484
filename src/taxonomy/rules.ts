import type { TaxonomyPath } from "@/types";

export interface KeywordRule {
  keywords: string[];
  path: Omit<TaxonomyPath, "source">;
}

/**
 * Ordered keyword rules; the first rule with a keyword contained in the
 * lower-cased phrase wins.
 */
export const KEYWORD_RULES: readonly KeywordRule[] = [
  {
    keywords: [
      "youtube",
      "tiktok",
      "instagram",
      "influencer",
      "youtuber",
      "content creator",
    ],
    path: {
      level1: "Career",
      level2: "Digital Creator",
      level3: "Social Media",
    },
  },
  {
    keywords: ["doctor", "lawyer", "engineer", "teacher", "nurse", "pilot"],
    path: { level1: "Career", level2: "Professional", level3: "Traditional" },
  },
  {
    keywords: ["rich", "money", "millionaire", "wealth"],
    path: { level1: "Financial", level2: "Wealth", level3: "Personal" },
  },
  {
    keywords: ["travel", "visit", "trip", "world"],
    path: { level1: "Travel", level2: "Adventure", level3: "Exploration" },
  },
  {
    keywords: ["marry", "married", "wedding", "love", "family", "children"],
    path: { level1: "Relationships", level2: "Romance", level3: "Marriage" },
  },
  {
    keywords: ["fit", "gym", "weight", "muscle"],
    path: { level1: "Health", level2: "Fitness", level3: "Physical" },
  },
];

export const DEFAULT_PATH: Omit<TaxonomyPath, "source"> = {
  level1: "Personal",
  level2: "Goals",
  level3: "General",
};

/**
 * Deterministic keyword classification. Always returns a path.
 */
export function ruleTaxonomy(
  phrase: string,
  rules: readonly KeywordRule[] = KEYWORD_RULES,
): TaxonomyPath {
  const lower = phrase.toLowerCase();
  const rule = rules.find((r) => r.keywords.some((k) => lower.includes(k)));
  return { ...(rule ? rule.path : DEFAULT_PATH), source: "rule" };
}
