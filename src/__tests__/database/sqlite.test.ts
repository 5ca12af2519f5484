import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SQLiteDatabase } from "../../database/sqlite";
import type { Cluster, DreamRecord } from "../../types";

const records: DreamRecord[] = [
  {
    id: "r2",
    rawTitle: "Be a doctor",
    authorId: "bob",
    normalizedPhrase: "to become a doctor",
    clusterId: "group_00001",
  },
  {
    id: "r1",
    rawTitle: "Become a doctor",
    authorId: "alice",
    birthDate: "2008-05-01",
    normalizedPhrase: "to become a doctor",
    clusterId: "group_00001",
  },
  {
    id: "r3",
    rawTitle: "Fly",
    authorId: "carol",
    normalizedPhrase: "to fly",
    clusterId: "group_00002",
  },
];

const clusters: Cluster[] = [
  {
    id: "group_00002",
    representative: "to fly",
    memberIds: ["r3"],
  },
  {
    id: "group_00001",
    representative: "to become a doctor",
    memberIds: ["r1", "r2"],
    taxonomy: {
      level1: "Career",
      level2: "Professional",
      level3: "Medical",
      source: "rule",
    },
  },
];

describe("SQLiteDatabase", () => {
  let db: SQLiteDatabase;

  beforeEach(() => {
    db = new SQLiteDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  describe("results", () => {
    it("should store records and list them by id", () => {
      db.writeResults(records, clusters);

      const dreams = db.listDreams();
      expect(dreams.map((d) => d.id)).toEqual(["r1", "r2", "r3"]);
      expect(dreams[0]).toEqual({
        id: "r1",
        rawTitle: "Become a doctor",
        authorId: "alice",
        birthDate: "2008-05-01",
        normalizedPhrase: "to become a doctor",
        clusterId: "group_00001",
      });
      expect(dreams[1].birthDate).toBeUndefined();
    });

    it("should filter records by cluster", () => {
      db.writeResults(records, clusters);

      expect(db.listDreams("group_00002").map((d) => d.id)).toEqual(["r3"]);
      expect(db.listDreams("group_99999")).toEqual([]);
    });

    it("should list clusters largest first", () => {
      db.writeResults(records, clusters);

      expect(db.listClusterSummaries()).toEqual([
        {
          id: "group_00001",
          representative: "to become a doctor",
          memberCount: 2,
          level1: "Career",
          level2: "Professional",
          level3: "Medical",
          taxonomySource: "rule",
        },
        {
          id: "group_00002",
          representative: "to fly",
          memberCount: 1,
          level1: null,
          level2: null,
          level3: null,
          taxonomySource: null,
        },
      ]);
      expect(db.listClusterSummaries(1)).toHaveLength(1);
    });

    it("should replace earlier results", () => {
      db.writeResults(records, clusters);
      db.writeResults(records.slice(2), clusters.slice(0, 1));

      expect(db.listDreams().map((d) => d.id)).toEqual(["r3"]);
      expect(db.listClusterSummaries().map((c) => c.id)).toEqual([
        "group_00002",
      ]);
    });
  });

  describe("embedding cache", () => {
    it("should store embeddings per model", () => {
      db.setCachedEmbedding("hash1", "model-a", [0.1, 0.2]);

      expect(db.getCachedEmbedding("hash1", "model-a")).toEqual([0.1, 0.2]);
      expect(db.getCachedEmbedding("hash1", "model-b")).toBeNull();
      expect(db.getCachedEmbedding("hash2", "model-a")).toBeNull();
    });

    it("should look up several hashes at once", () => {
      db.setCachedEmbedding("hash1", "model-a", [1]);
      db.setCachedEmbedding("hash2", "model-a", [2]);
      db.setCachedEmbedding("hash3", "model-b", [3]);

      const found = db.getCachedEmbeddingsBatch(
        ["hash1", "hash2", "hash3"],
        "model-a",
      );

      expect(Array.from(found.entries()).sort()).toEqual([
        ["hash1", [1]],
        ["hash2", [2]],
      ]);
      expect(db.getCachedEmbeddingsBatch([], "model-a").size).toBe(0);
    });

    it("should clear by model or entirely", () => {
      db.setCachedEmbedding("hash1", "model-a", [1]);
      db.setCachedEmbedding("hash2", "model-b", [2]);

      expect(db.clearEmbeddingCache("model-a")).toBe(1);
      expect(db.getCachedEmbedding("hash2", "model-b")).toEqual([2]);
      expect(db.clearEmbeddingCache()).toBe(1);
      expect(db.getCachedEmbedding("hash2", "model-b")).toBeNull();
    });
  });
});
