import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { z } from "zod";
import type { Cluster, DreamRecord, TaxonomySource } from "@/types";
import { TaxonomySourceSchema } from "@/types";

const EmbeddingSchema = z.array(z.number());

export interface ClusterSummaryRow {
  id: string;
  representative: string;
  memberCount: number;
  level1: string | null;
  level2: string | null;
  level3: string | null;
  taxonomySource: TaxonomySource | null;
}

export class SQLiteDatabase {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ":memory:") {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.initSchema();
  }

  private initSchema(): void {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS dreams (
        id TEXT PRIMARY KEY,
        raw_title TEXT NOT NULL,
        author_id TEXT NOT NULL DEFAULT '',
        birth_date TEXT,
        normalized_phrase TEXT,
        cluster_id TEXT
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS clusters (
        id TEXT PRIMARY KEY,
        representative TEXT NOT NULL,
        member_count INTEGER NOT NULL,
        level1 TEXT,
        level2 TEXT,
        level3 TEXT,
        taxonomy_source TEXT
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS embedding_cache (
        content_hash TEXT PRIMARY KEY,
        embedding TEXT NOT NULL,
        model TEXT NOT NULL,
        created_at INTEGER DEFAULT (unixepoch())
      )
    `);

    this.db.exec(
      "CREATE INDEX IF NOT EXISTS idx_dreams_cluster ON dreams(cluster_id)",
    );
    this.db.exec(
      "CREATE INDEX IF NOT EXISTS idx_embedding_cache_model ON embedding_cache(model)",
    );
  }

  /**
   * Replace both result tables with the given run output
   */
  writeResults(records: DreamRecord[], clusters: Cluster[]): void {
    const insertDream = this.db.prepare<
      [string, string, string, string | null, string | null, string | null]
    >(`
      INSERT INTO dreams (
        id, raw_title, author_id, birth_date, normalized_phrase, cluster_id
      ) VALUES (?, ?, ?, ?, ?, ?)
    `);
    const insertCluster = this.db.prepare<
      [
        string,
        string,
        number,
        string | null,
        string | null,
        string | null,
        string | null,
      ]
    >(`
      INSERT INTO clusters (
        id, representative, member_count, level1, level2, level3, taxonomy_source
      ) VALUES (?, ?, ?, ?, ?, ?, ?)
    `);

    const replaceAll = this.db.transaction(() => {
      this.db.exec("DELETE FROM dreams");
      this.db.exec("DELETE FROM clusters");
      for (const record of records) {
        insertDream.run(
          record.id,
          record.rawTitle,
          record.authorId,
          record.birthDate ?? null,
          record.normalizedPhrase ?? null,
          record.clusterId ?? null,
        );
      }
      for (const cluster of clusters) {
        insertCluster.run(
          cluster.id,
          cluster.representative,
          cluster.memberIds.length,
          cluster.taxonomy?.level1 ?? null,
          cluster.taxonomy?.level2 ?? null,
          cluster.taxonomy?.level3 ?? null,
          cluster.taxonomy?.source ?? null,
        );
      }
    });
    replaceAll();
  }

  listDreams(clusterId?: string): DreamRecord[] {
    const rows = clusterId
      ? this.db
          .prepare<[string], DreamRow>(
            "SELECT * FROM dreams WHERE cluster_id = ? ORDER BY id",
          )
          .all(clusterId)
      : this.db.prepare<[], DreamRow>("SELECT * FROM dreams ORDER BY id").all();
    return rows.map((row) => this.rowToDream(row));
  }

  listClusterSummaries(limit?: number): ClusterSummaryRow[] {
    const sql =
      "SELECT * FROM clusters ORDER BY member_count DESC, id ASC LIMIT ?";
    const rows = this.db.prepare<[number], ClusterRow>(sql).all(limit ?? -1);
    return rows.map((row) => this.rowToClusterSummary(row));
  }

  // Embedding cache operations
  getCachedEmbedding(contentHash: string, model: string): number[] | null {
    const row = this.db
      .prepare<[string, string], { embedding: string }>(
        "SELECT embedding FROM embedding_cache WHERE content_hash = ? AND model = ?",
      )
      .get(contentHash, model);
    if (!row) return null;
    return EmbeddingSchema.parse(JSON.parse(row.embedding));
  }

  setCachedEmbedding(
    contentHash: string,
    model: string,
    embedding: number[],
  ): void {
    this.db
      .prepare<[string, string, string]>(`
        INSERT OR REPLACE INTO embedding_cache (content_hash, model, embedding, created_at)
        VALUES (?, ?, ?, unixepoch())
      `)
      .run(contentHash, model, JSON.stringify(embedding));
  }

  getCachedEmbeddingsBatch(
    contentHashes: string[],
    model: string,
  ): Map<string, number[]> {
    const result = new Map<string, number[]>();
    if (contentHashes.length === 0) return result;

    const placeholders = contentHashes.map(() => "?").join(",");
    const rows = this.db
      .prepare<string[], { content_hash: string; embedding: string }>(
        `SELECT content_hash, embedding FROM embedding_cache WHERE content_hash IN (${placeholders}) AND model = ?`,
      )
      .all(...contentHashes, model);

    for (const row of rows) {
      result.set(
        row.content_hash,
        EmbeddingSchema.parse(JSON.parse(row.embedding)),
      );
    }
    return result;
  }

  clearEmbeddingCache(model?: string): number {
    if (model) {
      return this.db
        .prepare<[string]>("DELETE FROM embedding_cache WHERE model = ?")
        .run(model).changes;
    }
    return this.db.prepare("DELETE FROM embedding_cache").run().changes;
  }

  // Helpers
  private rowToDream(row: DreamRow): DreamRecord {
    return {
      id: row.id,
      rawTitle: row.raw_title,
      authorId: row.author_id,
      birthDate: row.birth_date ?? undefined,
      normalizedPhrase: row.normalized_phrase ?? undefined,
      clusterId: row.cluster_id ?? undefined,
    };
  }

  private rowToClusterSummary(row: ClusterRow): ClusterSummaryRow {
    const source = TaxonomySourceSchema.safeParse(row.taxonomy_source);
    return {
      id: row.id,
      representative: row.representative,
      memberCount: row.member_count,
      level1: row.level1,
      level2: row.level2,
      level3: row.level3,
      taxonomySource: source.success ? source.data : null,
    };
  }

  close(): void {
    this.db.close();
  }
}

// Row types for SQLite
interface DreamRow {
  id: string;
  raw_title: string;
  author_id: string;
  birth_date: string | null;
  normalized_phrase: string | null;
  cluster_id: string | null;
}

interface ClusterRow {
  id: string;
  representative: string;
  member_count: number;
  level1: string | null;
  level2: string | null;
  level3: string | null;
  taxonomy_source: string | null;
}
