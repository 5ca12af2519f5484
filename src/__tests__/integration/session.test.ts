import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { CheckpointManager } from "../../checkpoint";
import { SQLiteDatabase } from "../../database/sqlite";
import type { EmbeddingClient } from "../../embeddings/provider";
import { DreamGroupSession } from "../../session";
import {
  buildIndex,
  findSimilarClusters,
  getRunStatus,
  listClusters,
  mergeClusterGroups,
  runPipeline,
} from "../../tools/groups";
import { DEFAULT_CONFIG } from "../../types";
import { InMemoryVectorStore, type VectorStore } from "../../vectors";

const CORPUS = [
  "post_id\tpost_title\tusername\tdate_of_birth",
  "1\tBecome a doctor\talice\t2008-05-01",
  "2\tbecome a doctor\tbob\t1999-01-01",
  "3\tFly\tcarol\t",
  "4\tFly high\tdan\t2009-03-03",
  "5\t\terin\t",
].join("\n");

class LengthEmbedder implements EmbeddingClient {
  async embed(text: string): Promise<number[]> {
    return [text.length, 1];
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return texts.map((t) => [t.length, 1]);
  }
}

describe("DreamGroupSession", () => {
  let projectPath: string;
  let db: SQLiteDatabase;

  beforeEach(() => {
    projectPath = mkdtempSync(join(tmpdir(), "dreamgroup-session-"));
    writeFileSync(join(projectPath, "goals.tsv"), CORPUS, "utf-8");
    db = new SQLiteDatabase(":memory:");
  });

  afterEach(() => {
    db.close();
    rmSync(projectPath, { recursive: true, force: true });
  });

  function createSession(
    vectors = new InMemoryVectorStore(),
    openIndex: VectorStore | null = null,
  ) {
    return new DreamGroupSession({
      config: DEFAULT_CONFIG,
      checkpoint: new CheckpointManager(join(projectPath, "checkpoint.json")),
      db,
      oracle: null,
      embeddings: new LengthEmbedder(),
      vectors: openIndex,
      createVectors: () => vectors,
    });
  }

  function writeCorpus(name: string, titles: string[]): string {
    const rows = titles.map((title, i) => `${i + 1}\t${title}\tuser${i}\t`);
    const path = join(projectPath, name);
    writeFileSync(
      path,
      ["post_id\tpost_title\tusername\tdate_of_birth", ...rows].join("\n"),
      "utf-8",
    );
    return path;
  }

  async function finishedSession() {
    const session = createSession();
    runPipeline({ corpusPath: "goals.tsv", fresh: false }, session, projectPath);
    await session.waitForIdle();
    return session;
  }

  function clusterIdFor(session: DreamGroupSession, phrase: string): string {
    const cluster = session
      .clusters()
      ?.list()
      .find((c) => c.representative === phrase);
    if (!cluster) {
      throw new Error(`No cluster for ${phrase}`);
    }
    return cluster.id;
  }

  it("should report that nothing has run yet", async () => {
    const session = createSession();

    expect(getRunStatus(session).stage).toBe("idle");
    expect(
      listClusters({ limit: 10, byAgeBand: false }, session),
    ).toBeNull();
    await expect(
      findSimilarClusters({ clusterId: "group_00001" }, session),
    ).rejects.toThrow("No finished run yet");
  });

  it("should run in the background and refuse a second run", async () => {
    const session = createSession();

    const first = runPipeline(
      { corpusPath: "goals.tsv", fresh: false },
      session,
      projectPath,
    );
    const second = runPipeline(
      { corpusPath: "goals.tsv", fresh: false },
      session,
      projectPath,
    );
    await session.waitForIdle();

    expect(first).toEqual({
      started: true,
      message: `Run started for ${join(projectPath, "goals.tsv")}`,
    });
    expect(second).toEqual({
      started: false,
      message: "A run is already in progress",
    });
    expect(getRunStatus(session)).toMatchObject({
      stage: "done",
      running: false,
      lastError: null,
    });
  });

  it("should group exact duplicates and classify every cluster", async () => {
    const session = await finishedSession();

    const result = listClusters({ limit: 10, byAgeBand: false }, session);

    expect(result?.summary.totalRecords).toBe(4);
    expect(result?.summary.totalClusters).toBe(3);
    expect(result?.summary.largestClusters[0]).toMatchObject({
      representative: "to become a doctor",
      memberCount: 2,
      taxonomy: {
        level1: "Career",
        level2: "Professional",
        level3: "Traditional",
        source: "rule",
      },
    });
    expect(db.listClusterSummaries().map((c) => c.memberCount)).toEqual([
      2, 1, 1,
    ]);
  });

  it("should break clusters down by age band", async () => {
    const session = await finishedSession();

    const result = listClusters(
      { limit: 10, byAgeBand: true, referenceDate: "2024-06-01" },
      session,
    );

    expect(result?.ageBands?.["13-18"].records).toBe(2);
    expect(result?.ageBands?.["18-30"].records).toBe(1);
    expect(result?.ageBands?.other.records).toBe(1);
  });

  it("should suggest look-alikes from the lexical tier before indexing", async () => {
    const session = await finishedSession();
    const fly = clusterIdFor(session, "to fly");

    const result = await findSimilarClusters(
      { clusterId: fly, threshold: 50 },
      session,
    );

    expect(result.vectorTierAvailable).toBe(false);
    expect(
      result.results.map((r) => [r.cluster.representative, r.tier]),
    ).toEqual([["to fly high", "lexical"]]);
  });

  it("should build the vector index on demand", async () => {
    const vectors = new InMemoryVectorStore();
    const session = createSession(vectors);
    runPipeline({ corpusPath: "goals.tsv", fresh: false }, session, projectPath);
    await session.waitForIdle();

    expect(await buildIndex(session)).toEqual({ indexed: 3, skipped: 0 });
    expect(session.vectorTierAvailable).toBe(true);
    expect(await vectors.getCollectionInfo()).toEqual({ vectorsCount: 3 });
  });

  it("should persist a manual merge", async () => {
    const session = await finishedSession();
    const fly = clusterIdFor(session, "to fly");
    const flyHigh = clusterIdFor(session, "to fly high");

    const merged = mergeClusterGroups(
      { targetId: fly, sourceIds: [flyHigh] },
      session,
    );

    expect(merged.memberIds).toEqual(["3", "4"]);
    expect(db.listDreams(fly).map((d) => d.id)).toEqual(["3", "4"]);

    const reopened = createSession();
    expect(reopened.clusters()?.get(flyHigh)).toBeUndefined();
    expect(reopened.clusters()?.get(fly)?.memberIds).toEqual(["3", "4"]);
  });

  it("should reject merging an unknown cluster", async () => {
    const session = await finishedSession();

    expect(() =>
      mergeClusterGroups(
        { targetId: clusterIdFor(session, "to fly"), sourceIds: ["group_99999"] },
        session,
      ),
    ).toThrow("Cluster not found: group_99999");
  });

  it("should surface a missing corpus in the status", async () => {
    const session = createSession();

    runPipeline({ corpusPath: "missing.tsv", fresh: true }, session, projectPath);
    await session.waitForIdle();

    expect(getRunStatus(session).lastError).toBe(
      `Corpus file not found: ${join(projectPath, "missing.tsv")}`,
    );
  });

  it("should stop serving the vector index once a new run replaces the clusters", async () => {
    const vectors = new InMemoryVectorStore();
    const session = createSession(vectors);
    await session.runNow(writeCorpus("a.tsv", ["Fly", "Fly higher"]));
    await session.buildIndex();

    await session.runNow(writeCorpus("b.tsv", ["Fly", "Cook pasta"]), {
      fresh: true,
    });
    const result = await session.similar(clusterIdFor(session, "to fly"), 5, 0);

    expect(session.vectorTierAvailable).toBe(false);
    expect(result.vectorTierAvailable).toBe(false);
    expect(result.results.filter((r) => r.tier === "vector")).toEqual([]);
  });

  it("should ignore index entries whose phrase left the cluster", async () => {
    const vectors = new InMemoryVectorStore();
    const first = createSession(vectors);
    await first.runNow(writeCorpus("a.tsv", ["Fly", "Fly higher"]));
    await first.buildIndex();
    await first.runNow(writeCorpus("b.tsv", ["Fly", "Cook pasta"]), {
      fresh: true,
    });

    const reopened = createSession(new InMemoryVectorStore(), vectors);
    const result = await reopened.similar(
      clusterIdFor(reopened, "to fly"),
      5,
      0,
    );

    expect(result.vectorTierAvailable).toBe(true);
    expect(result.results.filter((r) => r.tier === "vector")).toEqual([]);
  });

  it("should refuse to merge after a restarted run fails", async () => {
    const session = await finishedSession();
    const fly = clusterIdFor(session, "to fly");
    const flyHigh = clusterIdFor(session, "to fly high");

    runPipeline({ corpusPath: "missing.tsv", fresh: true }, session, projectPath);
    await session.waitForIdle();

    expect(() =>
      mergeClusterGroups({ targetId: fly, sourceIds: [flyHigh] }, session),
    ).toThrow("No finished run yet; start one with dreamgroup_run");
    expect(session.clusters()).toBeNull();
  });
});
