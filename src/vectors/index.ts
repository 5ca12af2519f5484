// Vector store interface and types
export type {
  VectorStore,
  VectorPayload,
  VectorSearchResult,
} from "./interface";
export { distanceToScore } from "./interface";

// Implementations
export { InMemoryVectorStore } from "./memory";
export { SqliteVecStore, type SqliteVecConfig } from "./sqlite-vec";

// Factory
export { createVectorStore, openExistingVectorStore } from "./factory";
