import {
  distanceToScore,
  type VectorPayload,
  type VectorSearchResult,
  type VectorStore,
} from "./interface";

interface StoredVector {
  vector: number[];
  payload: VectorPayload;
}

function l2Distance(a: number[], b: number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] - (b[i] ?? 0);
    sum += diff * diff;
  }
  return Math.sqrt(sum);
}

/**
 * Brute-force vector store kept in a Map. Data is lost when the process
 * exits; intended for tests and small corpora.
 */
export class InMemoryVectorStore implements VectorStore {
  private vectors = new Map<string, StoredVector>();

  async initialize(): Promise<void> {}

  async upsert(
    id: string,
    vector: number[],
    payload: VectorPayload,
  ): Promise<string> {
    this.vectors.set(id, { vector: [...vector], payload: { ...payload } });
    return id;
  }

  async search(
    vector: number[],
    limit: number = 10,
  ): Promise<VectorSearchResult[]> {
    return Array.from(this.vectors.entries())
      .map(([id, stored]) => {
        const distance = l2Distance(vector, stored.vector);
        return {
          id,
          distance,
          score: distanceToScore(distance),
          payload: { ...stored.payload },
        };
      })
      .sort((a, b) => a.distance - b.distance || (a.id < b.id ? -1 : 1))
      .slice(0, limit);
  }

  async getVector(id: string): Promise<number[] | null> {
    const stored = this.vectors.get(id);
    return stored ? [...stored.vector] : null;
  }

  async clear(): Promise<void> {
    this.vectors.clear();
  }

  async getCollectionInfo(): Promise<{ vectorsCount: number }> {
    return { vectorsCount: this.vectors.size };
  }
}
