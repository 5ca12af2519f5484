import { createHash } from "node:crypto";
import type { SQLiteDatabase } from "@/database/sqlite";
import type { EmbeddingClient } from "./provider";

/**
 * Storage operations the cache needs
 */
export type EmbeddingCacheStore = Pick<
  SQLiteDatabase,
  "getCachedEmbedding" | "setCachedEmbedding" | "getCachedEmbeddingsBatch"
>;

function hashContent(content: string): string {
  return createHash("sha256").update(content).digest("hex");
}

/**
 * Wraps an embedding client with a SQLite-backed cache keyed by content
 * hash and model
 */
export class CachedEmbeddingClient implements EmbeddingClient {
  constructor(
    private client: EmbeddingClient,
    private storage: EmbeddingCacheStore,
    private model: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    const contentHash = hashContent(text);

    // Check cache first
    const cached = this.storage.getCachedEmbedding(contentHash, this.model);
    if (cached) {
      return cached;
    }

    // Generate embedding
    const embedding = await this.client.embed(text);

    // Cache it
    this.storage.setCachedEmbedding(contentHash, this.model, embedding);

    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) return [];

    const hashes = texts.map((t) => hashContent(t));
    const cachedMap = this.storage.getCachedEmbeddingsBatch(hashes, this.model);

    // Find which texts need embedding
    const uncached = texts
      .map((text, index) => ({ text, hash: hashes[index] }))
      .filter(({ hash }) => !cachedMap.has(hash));

    if (uncached.length > 0) {
      const fresh = await this.client.embedBatch(uncached.map((u) => u.text));
      if (fresh.length !== uncached.length) {
        throw new Error(
          `Embedding client returned ${fresh.length} vectors for ${uncached.length} texts`,
        );
      }
      uncached.forEach(({ hash }, i) => {
        const embedding = fresh[i];
        this.storage.setCachedEmbedding(hash, this.model, embedding);
        cachedMap.set(hash, embedding);
      });
    }

    // Assemble results in original order
    return hashes.map((hash) => {
      const embedding = cachedMap.get(hash);
      if (!embedding) {
        throw new Error(`Missing embedding for content hash ${hash}`);
      }
      return embedding;
    });
  }
}
