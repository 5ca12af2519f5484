export interface VectorPayload {
  /** Normalized phrase the vector was computed for */
  phrase: string;
  /** Cluster the phrase belonged to when the index was built */
  clusterId: string;
}

export interface VectorSearchResult {
  id: string;
  /** Raw L2 distance */
  distance: number;
  /** 0-1, derived from distance on unit vectors */
  score: number;
  payload: VectorPayload;
}

/**
 * Abstract interface for vector storage backends.
 * Implementations: SqliteVecStore (embedded), InMemoryVectorStore (tests)
 */
export interface VectorStore {
  /**
   * Initialize the vector store (create tables, indexes)
   */
  initialize(): Promise<void>;

  /**
   * Insert or update a vector with payload
   */
  upsert(id: string, vector: number[], payload: VectorPayload): Promise<string>;

  /**
   * Nearest neighbours by L2 distance
   */
  search(vector: number[], limit?: number): Promise<VectorSearchResult[]>;

  /**
   * Vector stored under an id, if any
   */
  getVector(id: string): Promise<number[] | null>;

  /**
   * Remove every vector
   */
  clear(): Promise<void>;

  /**
   * Get table statistics
   */
  getCollectionInfo(): Promise<{ vectorsCount: number }>;

  /**
   * Close the connection (optional - for embedded stores)
   */
  close?(): void;
}

/**
 * L2 distance on unit vectors ranges over 0..2
 */
export function distanceToScore(distance: number): number {
  return Math.max(0, 1 - distance / 2);
}
