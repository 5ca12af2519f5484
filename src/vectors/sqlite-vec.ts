import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import * as sqliteVec from "sqlite-vec";
import { z } from "zod";
import {
  distanceToScore,
  type VectorPayload,
  type VectorSearchResult,
  type VectorStore,
} from "./interface";

const DEFAULT_VECTOR_SIZE = 768;

const PayloadSchema = z.object({
  phrase: z.string(),
  clusterId: z.string(),
});

export interface SqliteVecConfig {
  dbPath: string;
  tableName?: string;
  vectorSize?: number;
}

function toBlob(vector: number[]): Buffer {
  return Buffer.from(new Float32Array(vector).buffer);
}

/**
 * Embedded vector store using the sqlite-vec extension
 */
export class SqliteVecStore implements VectorStore {
  private readonly db: Database.Database;
  private readonly tableName: string;
  private readonly vectorSize: number;
  private initialized = false;

  constructor(config: SqliteVecConfig | string) {
    const opts =
      typeof config === "string"
        ? {
            dbPath: config,
            tableName: "phrase_vectors",
            vectorSize: DEFAULT_VECTOR_SIZE,
          }
        : {
            dbPath: config.dbPath,
            tableName: config.tableName ?? "phrase_vectors",
            vectorSize: config.vectorSize ?? DEFAULT_VECTOR_SIZE,
          };

    this.tableName = opts.tableName;
    this.vectorSize = opts.vectorSize;

    // Ensure directory exists
    if (opts.dbPath !== ":memory:") {
      const dir = dirname(opts.dbPath);
      if (dir && !existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(opts.dbPath);
    this.db.pragma("journal_mode = WAL");
    sqliteVec.load(this.db);
  }

  async initialize(): Promise<void> {
    if (this.initialized) return;

    this.db.exec(`
      CREATE VIRTUAL TABLE IF NOT EXISTS ${this.tableName}
      USING vec0(
        id TEXT PRIMARY KEY,
        embedding float[${this.vectorSize}]
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.tableName}_metadata (
        id TEXT PRIMARY KEY,
        cluster_id TEXT NOT NULL,
        phrase TEXT NOT NULL
      )
    `);

    this.db.exec(
      `CREATE INDEX IF NOT EXISTS idx_${this.tableName}_cluster ON ${this.tableName}_metadata(cluster_id)`,
    );

    this.initialized = true;
  }

  async upsert(
    id: string,
    vector: number[],
    payload: VectorPayload,
  ): Promise<string> {
    await this.initialize();
    this.assertDimension(vector);

    const write = this.db.transaction(() => {
      this.db
        .prepare<[string]>(`DELETE FROM ${this.tableName} WHERE id = ?`)
        .run(id);
      this.db
        .prepare<[string]>(`DELETE FROM ${this.tableName}_metadata WHERE id = ?`)
        .run(id);
      this.db
        .prepare<[string, Buffer]>(
          `INSERT INTO ${this.tableName}(id, embedding) VALUES (?, ?)`,
        )
        .run(id, toBlob(vector));
      this.db
        .prepare<[string, string, string]>(
          `INSERT INTO ${this.tableName}_metadata(id, cluster_id, phrase) VALUES (?, ?, ?)`,
        )
        .run(id, payload.clusterId, payload.phrase);
    });
    write();
    return id;
  }

  async search(
    vector: number[],
    limit: number = 10,
  ): Promise<VectorSearchResult[]> {
    await this.initialize();
    this.assertDimension(vector);

    // vec0 needs an integer k, hence the BigInt
    const rows = this.db
      .prepare<
        [Buffer, bigint],
        { id: string; distance: number; cluster_id: string; phrase: string }
      >(
        `SELECT v.id, v.distance, m.cluster_id, m.phrase
        FROM ${this.tableName} v
        JOIN ${this.tableName}_metadata m ON m.id = v.id
        WHERE v.embedding MATCH ? AND k = ?
        ORDER BY v.distance`,
      )
      .all(toBlob(vector), BigInt(limit));

    return rows.map((row) => ({
      id: row.id,
      distance: row.distance,
      score: distanceToScore(row.distance),
      payload: PayloadSchema.parse({
        phrase: row.phrase,
        clusterId: row.cluster_id,
      }),
    }));
  }

  async getVector(id: string): Promise<number[] | null> {
    await this.initialize();

    const row = this.db
      .prepare<[string], { embedding: Buffer }>(
        `SELECT embedding FROM ${this.tableName} WHERE id = ?`,
      )
      .get(id);
    if (!row) return null;

    const floats = new Float32Array(
      row.embedding.buffer,
      row.embedding.byteOffset,
      row.embedding.byteLength / Float32Array.BYTES_PER_ELEMENT,
    );
    return Array.from(floats);
  }

  async clear(): Promise<void> {
    await this.initialize();
    this.db.exec(`DELETE FROM ${this.tableName}`);
    this.db.exec(`DELETE FROM ${this.tableName}_metadata`);
  }

  async getCollectionInfo(): Promise<{ vectorsCount: number }> {
    await this.initialize();

    const result = this.db
      .prepare<[], { count: number }>(
        `SELECT COUNT(*) as count FROM ${this.tableName}_metadata`,
      )
      .get();

    return { vectorsCount: result?.count ?? 0 };
  }

  close(): void {
    this.db.close();
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.vectorSize) {
      throw new Error(
        `Vector dimension mismatch: expected ${this.vectorSize}, got ${vector.length}`,
      );
    }
  }
}
