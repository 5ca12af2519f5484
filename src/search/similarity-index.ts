/**
 * Similarity Search Index
 *
 * Suggests clusters that resemble a given cluster, for manual review and
 * merging. The vector tier uses precomputed phrase embeddings; the lexical
 * tier fills in when the vector tier is missing or comes up short.
 *
 * The vector index is a point-in-time snapshot, so every hit is checked
 * against the live cluster state before it is returned.
 */

import type {
  Cluster,
  DreamRecord,
  SearchConfig,
  SimilarCluster,
  SimilarClustersResult,
} from "@/types";
import type { VectorStore } from "@/vectors";
import { phraseVectorId } from "./build";
import { lexicalSimilarity } from "./lexical";

/**
 * Read access to live clusters
 */
export interface ClusterSource {
  get(clusterId: string): Cluster | undefined;
  list(): Cluster[];
  getRecord(recordId: string): DreamRecord | undefined;
}

const DEFAULT_CONFIG: SearchConfig = {
  defaultLimit: 10,
  defaultThreshold: 70,
  minLexicalScore: 30,
  overfetch: 5,
};

export function compareResults(a: SimilarCluster, b: SimilarCluster): number {
  if (b.similarity !== a.similarity) {
    return b.similarity - a.similarity;
  }
  const sizeDiff = b.cluster.memberIds.length - a.cluster.memberIds.length;
  if (sizeDiff !== 0) {
    return sizeDiff;
  }
  return a.cluster.id < b.cluster.id ? -1 : a.cluster.id > b.cluster.id ? 1 : 0;
}

export class SimilaritySearchIndex {
  private config: SearchConfig;

  constructor(
    private clusters: ClusterSource,
    private vectors: VectorStore | null,
    config: Partial<SearchConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get available(): boolean {
    return this.vectors !== null;
  }

  /**
   * @param threshold - minimum similarity on the 0-100 scale
   * @throws if the query cluster does not exist
   */
  async search(
    queryClusterId: string,
    k: number = this.config.defaultLimit,
    threshold: number = this.config.defaultThreshold,
  ): Promise<SimilarClustersResult> {
    const query = this.clusters.get(queryClusterId);
    if (!query) {
      throw new Error(`Cluster not found: ${queryClusterId}`);
    }

    const vectorHits = await this.vectorTier(query, k, threshold);
    const merged = new Map<string, SimilarCluster>();
    for (const hit of vectorHits) {
      merged.set(hit.cluster.id, hit);
    }

    if (vectorHits.length < k) {
      for (const hit of this.lexicalTier(query, threshold)) {
        if (!merged.has(hit.cluster.id)) {
          merged.set(hit.cluster.id, hit);
        }
      }
    }

    const results = Array.from(merged.values())
      .sort(compareResults)
      .slice(0, k);

    return { query, results, vectorTierAvailable: this.available };
  }

  private async vectorTier(
    query: Cluster,
    k: number,
    threshold: number,
  ): Promise<SimilarCluster[]> {
    if (!this.vectors) {
      return [];
    }

    const queryVector = await this.vectors.getVector(
      phraseVectorId(query.representative),
    );
    if (!queryVector) {
      return [];
    }

    const hits = await this.vectors.search(
      queryVector,
      k * this.config.overfetch,
    );

    // Best score per live cluster
    const best = new Map<string, SimilarCluster>();
    for (const hit of hits) {
      const clusterId = hit.payload.clusterId;
      if (clusterId === query.id) continue;

      const cluster = this.clusters.get(clusterId);
      if (!cluster || !this.holdsPhrase(cluster, hit.payload.phrase)) continue;

      const similarity = hit.score * 100;
      if (similarity < threshold) continue;

      const current = best.get(clusterId);
      if (!current || similarity > current.similarity) {
        best.set(clusterId, { cluster, similarity, tier: "vector" });
      }
    }

    return Array.from(best.values());
  }

  // Cluster ids are reused across runs; the phrase ties a hit to its cluster
  private holdsPhrase(cluster: Cluster, phrase: string): boolean {
    return cluster.memberIds.some(
      (id) => this.clusters.getRecord(id)?.normalizedPhrase === phrase,
    );
  }

  private lexicalTier(query: Cluster, threshold: number): SimilarCluster[] {
    const gate = Math.max(threshold, this.config.minLexicalScore);
    const results: SimilarCluster[] = [];

    for (const cluster of this.clusters.list()) {
      if (cluster.id === query.id) continue;

      const similarity = lexicalSimilarity(
        query.representative,
        cluster.representative,
      );
      if (similarity >= gate) {
        results.push({ cluster, similarity, tier: "lexical" });
      }
    }

    return results;
  }
}
