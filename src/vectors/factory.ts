import { existsSync } from "node:fs";
import { join } from "node:path";
import type { VectorConfig } from "@/types";
import type { VectorStore } from "./interface";
import { SqliteVecStore } from "./sqlite-vec";

/**
 * Create the configured vector store
 */
export function createVectorStore(
  config: VectorConfig,
  projectPath: string,
): VectorStore {
  return new SqliteVecStore({
    dbPath: join(projectPath, config.dbPath),
    vectorSize: config.vectorSize,
  });
}

/**
 * Open the vector store only if its database file already exists.
 * Returns null when the index has never been built or cannot be loaded.
 */
export function openExistingVectorStore(
  config: VectorConfig,
  projectPath: string,
): VectorStore | null {
  const dbPath = join(projectPath, config.dbPath);
  if (!existsSync(dbPath)) {
    return null;
  }

  try {
    return createVectorStore(config, projectPath);
  } catch (error) {
    console.warn("[dreamgroup] Vector index unavailable:", error);
    return null;
  }
}
