import { z } from "zod";

// Dream records
export const DreamRecordSchema = z.object({
  id: z.string(),
  rawTitle: z.string(),
  authorId: z.string().default(""),
  birthDate: z.string().optional(),
  normalizedPhrase: z.string().optional(),
  clusterId: z.string().optional(),
});
export type DreamRecord = z.infer<typeof DreamRecordSchema>;

// Taxonomy
export const TaxonomySourceSchema = z.enum(["oracle", "rule"]);
export type TaxonomySource = z.infer<typeof TaxonomySourceSchema>;

export const TaxonomyPathSchema = z.object({
  level1: z.string().min(1),
  level2: z.string().min(1),
  level3: z.string().min(1),
  source: TaxonomySourceSchema,
});
export type TaxonomyPath = z.infer<typeof TaxonomyPathSchema>;

// Clusters
export const ClusterSchema = z.object({
  id: z.string(),
  representative: z.string(),
  memberIds: z.array(z.string()),
  taxonomy: TaxonomyPathSchema.optional(),
});
export type Cluster = z.infer<typeof ClusterSchema>;

// Oracle config
export const AnthropicOracleConfigSchema = z.object({
  provider: z.literal("anthropic"),
  apiKey: z.string().optional(),
  model: z.string().default("claude-3-haiku-20240307"),
  /** Fixed pause between consecutive oracle calls */
  callDelayMs: z.number().int().min(0).default(50),
});

export const OracleConfigSchema = z.discriminatedUnion("provider", [
  AnthropicOracleConfigSchema,
]);
export type OracleConfig = z.infer<typeof OracleConfigSchema>;

// Embedding config - discriminated union per provider
export const LocalEmbeddingConfigSchema = z.object({
  provider: z.literal("local"),
  endpoint: z.string().default("http://localhost:8080"),
});

export const OpenAIEmbeddingConfigSchema = z.object({
  provider: z.literal("openai"),
  apiKey: z.string(),
  model: z.string().default("text-embedding-3-small"),
});

export const OllamaEmbeddingConfigSchema = z.object({
  provider: z.literal("ollama"),
  endpoint: z.string().default("http://localhost:11434"),
  model: z.string().default("nomic-embed-text"),
});

export const EmbeddingConfigSchema = z.discriminatedUnion("provider", [
  LocalEmbeddingConfigSchema,
  OpenAIEmbeddingConfigSchema,
  OllamaEmbeddingConfigSchema,
]);
export type EmbeddingConfig = z.infer<typeof EmbeddingConfigSchema>;

export const VectorConfigSchema = z.object({
  provider: z.literal("sqlite-vec"),
  dbPath: z.string().default(".dreamgroup/vectors.db"),
  vectorSize: z.number().int().positive().default(768), // nomic-embed-text dimension
});
export type VectorConfig = z.infer<typeof VectorConfigSchema>;

export const StorageConfigSchema = z.object({
  dbPath: z.string(),
  checkpointPath: z.string(),
});
export type StorageConfig = z.infer<typeof StorageConfigSchema>;

export const PipelineConfigSchema = z.object({
  /** Save a checkpoint after this many processed items */
  checkpointEvery: z.number().int().positive().default(100),
  /** Number of following clusters compared against each cluster */
  mergeWindow: z.number().int().min(1).max(200).default(20),
  /** Leading characters of the first word that must agree before an oracle call */
  prefixLength: z.number().int().min(0).max(10).default(2),
});
export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;

export const SearchConfigSchema = z.object({
  defaultLimit: z.number().int().positive().default(10),
  /** Minimum similarity (0-100) for a result to count */
  defaultThreshold: z.number().min(0).max(100).default(70),
  /** Floor for lexical-tier scores (0-100) */
  minLexicalScore: z.number().min(0).max(100).default(30),
  /** Candidates fetched from the vector store per requested result */
  overfetch: z.number().int().min(1).default(5),
});
export type SearchConfig = z.infer<typeof SearchConfigSchema>;

export const CacheConfigSchema = z.object({
  /** Omit for an unbounded cache (single pipeline run) */
  maxEntries: z.number().int().positive().optional(),
  /** Omit to keep entries for the life of the process */
  ttlMs: z.number().int().positive().optional(),
});
export type CacheConfig = z.infer<typeof CacheConfigSchema>;

export const ConfigSchema = z.object({
  oracle: OracleConfigSchema,
  embedding: EmbeddingConfigSchema,
  vector: VectorConfigSchema,
  storage: StorageConfigSchema,
  pipeline: PipelineConfigSchema.default({}),
  search: SearchConfigSchema.default({}),
  cache: CacheConfigSchema.default({}),
});
export type Config = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: Config = {
  oracle: {
    provider: "anthropic",
    model: "claude-3-haiku-20240307",
    callDelayMs: 50,
  },
  embedding: {
    provider: "ollama",
    endpoint: "http://localhost:11434",
    model: "nomic-embed-text",
  },
  vector: {
    provider: "sqlite-vec",
    dbPath: ".dreamgroup/vectors.db",
    vectorSize: 768,
  },
  storage: {
    dbPath: ".dreamgroup/local.db",
    checkpointPath: ".dreamgroup/checkpoint.json",
  },
  pipeline: { checkpointEvery: 100, mergeWindow: 20, prefixLength: 2 },
  search: {
    defaultLimit: 10,
    defaultThreshold: 70,
    minLexicalScore: 30,
    overfetch: 5,
  },
  cache: {},
};

// Search types
export const SearchTierSchema = z.enum(["vector", "lexical"]);
export type SearchTier = z.infer<typeof SearchTierSchema>;

export interface SimilarCluster {
  cluster: Cluster;
  /** 0-100 */
  similarity: number;
  tier: SearchTier;
}

export interface SimilarClustersResult {
  query: Cluster;
  results: SimilarCluster[];
  vectorTierAvailable: boolean;
}
