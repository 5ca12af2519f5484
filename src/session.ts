/**
 * Dream grouping session
 *
 * Long-lived state behind the MCP tools: the background worker, the status
 * board, the live cluster state and the similarity index over it.
 */

import { OracleCache } from "@/caching";
import type { CheckpointManager } from "@/checkpoint";
import { ClusterStore, mergeClusters } from "@/clustering";
import { loadCorpus } from "@/corpus";
import type { SQLiteDatabase } from "@/database/sqlite";
import type { EmbeddingClient } from "@/embeddings/provider";
import { TextNormalizer, type NormalizeResult } from "@/normalize";
import type { TextOracle } from "@/oracle";
import {
  PipelineRunner,
  type PipelineRunResult,
  PipelineWorker,
  StatusBoard,
} from "@/pipeline";
import {
  type BuildIndexResult,
  buildSimilarityIndex,
  SimilaritySearchIndex,
} from "@/search";
import { EquivalenceJudge } from "@/similarity";
import { TaxonomyClassifier } from "@/taxonomy";
import type {
  Cluster,
  Config,
  SimilarClustersResult,
  TaxonomyPath,
} from "@/types";
import type { VectorStore } from "@/vectors";

export interface SessionDependencies {
  config: Config;
  checkpoint: CheckpointManager;
  db: SQLiteDatabase;
  oracle: TextOracle | null;
  /** Null when no embedding provider is reachable */
  embeddings: EmbeddingClient | null;
  /** Null when the vector index has not been built */
  vectors: VectorStore | null;
  /** Store used by a later index build when `vectors` is null */
  createVectors?: () => VectorStore;
}

export interface RunOptions {
  /** Discard any checkpoint and start over */
  fresh?: boolean;
}

export class DreamGroupSession {
  readonly status = new StatusBoard();
  private worker = new PipelineWorker(this.status);
  private normalizeCache: OracleCache<NormalizeResult>;
  private equivalenceCache: OracleCache<boolean>;
  private taxonomyCache: OracleCache<TaxonomyPath>;
  private store: ClusterStore | null = null;
  /** Index searched by the vector tier; null until it matches the clusters */
  private vectors: VectorStore | null;
  private indexStore: VectorStore | null;

  constructor(private deps: SessionDependencies) {
    this.normalizeCache = new OracleCache<NormalizeResult>(deps.config.cache);
    this.equivalenceCache = new OracleCache<boolean>(deps.config.cache);
    this.taxonomyCache = new OracleCache<TaxonomyPath>(deps.config.cache);
    this.vectors = deps.vectors;
    this.indexStore = deps.vectors;
  }

  get running(): boolean {
    return this.worker.running;
  }

  /**
   * Launch a background run
   *
   * @returns false when a run is already in progress
   */
  startRun(corpusPath: string, options: RunOptions = {}): boolean {
    return this.worker.start(() => this.runNow(corpusPath, options));
  }

  async waitForIdle(): Promise<void> {
    await this.worker.waitForIdle();
  }

  /**
   * Run the pipeline in the caller's task and export the results
   */
  async runNow(
    corpusPath: string,
    options: RunOptions = {},
  ): Promise<PipelineRunResult> {
    // Results and the phrase index describe the previous run
    this.store = null;
    this.vectors = null;
    if (options.fresh) {
      this.deps.checkpoint.clear();
    }

    this.status.publish({ stage: "loading" });
    const { records, skipped } = loadCorpus(corpusPath);
    if (skipped > 0) {
      console.warn(`[dreamgroup] Skipped ${skipped} corpus rows`);
    }

    const { config, oracle } = this.deps;
    const runner = new PipelineRunner({
      normalizer: new TextNormalizer(oracle, { cache: this.normalizeCache }),
      judge: new EquivalenceJudge(oracle, { cache: this.equivalenceCache }),
      classifier: new TaxonomyClassifier(oracle, {
        cache: this.taxonomyCache,
      }),
      checkpoint: this.deps.checkpoint,
      status: this.status,
      config: config.pipeline,
    });

    const result = await runner.run(records);
    this.deps.db.writeResults(result.records, result.clusters);
    this.store = ClusterStore.fromSnapshot(result);
    return result;
  }

  /**
   * Live cluster state from the last finished run, or null if there is none
   */
  clusters(): ClusterStore | null {
    if (this.store) {
      return this.store;
    }
    const state = this.deps.checkpoint.load();
    if (state.stage !== "done") {
      return null;
    }
    this.store = ClusterStore.fromSnapshot(state);
    return this.store;
  }

  async similar(
    clusterId: string,
    limit?: number,
    threshold?: number,
  ): Promise<SimilarClustersResult> {
    const store = this.requireClusters();
    const index = new SimilaritySearchIndex(
      store,
      this.vectors,
      this.deps.config.search,
    );
    return index.search(clusterId, limit, threshold);
  }

  /**
   * Fold reviewed clusters into a target and persist the result
   */
  merge(targetId: string, sourceIds: string[]): Cluster {
    if (this.running) {
      throw new Error("Cannot merge clusters while a run is in progress");
    }

    const state = this.deps.checkpoint.load();
    if (state.stage !== "done") {
      throw new Error("No finished run yet; start one with dreamgroup_run");
    }
    const store = this.requireClusters();
    const merged = mergeClusters(store, targetId, sourceIds);

    const snapshot = store.snapshot();
    this.deps.checkpoint.save({
      ...state,
      records: snapshot.records,
      clusters: snapshot.clusters,
      classifiedIds: state.classifiedIds.filter((id) => store.has(id)),
    });
    this.deps.db.writeResults(snapshot.records, snapshot.clusters);
    return merged;
  }

  async buildIndex(): Promise<BuildIndexResult> {
    if (this.running) {
      throw new Error("Cannot build the index while a run is in progress");
    }
    const embeddings = this.deps.embeddings;
    if (!embeddings) {
      throw new Error("No embedding provider is configured");
    }

    const store = this.requireClusters();
    const vectors = this.indexStore ?? this.deps.createVectors?.();
    if (!vectors) {
      throw new Error("No vector store is available");
    }
    this.indexStore = vectors;

    const result = await buildSimilarityIndex(
      store.listRecords(),
      embeddings,
      vectors,
      {
        onProgress: (indexed, total) =>
          console.error(`[dreamgroup] Indexed ${indexed}/${total} phrases`),
      },
    );
    this.vectors = vectors;
    return result;
  }

  get vectorTierAvailable(): boolean {
    return this.vectors !== null;
  }

  private requireClusters(): ClusterStore {
    const store = this.clusters();
    if (!store) {
      throw new Error("No finished run yet; start one with dreamgroup_run");
    }
    return store;
  }
}
