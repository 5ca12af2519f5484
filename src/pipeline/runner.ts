/**
 * Pipeline runner
 *
 * Drives records through normalize -> exact -> merge -> classify. Every
 * stage checkpoints at the configured cadence and once more when it
 * finishes, so a restarted run picks up only the work that is left.
 */

import type {
  CheckpointManager,
  CheckpointState,
  PipelineStage,
} from "@/checkpoint";
import {
  ClusteringEngine,
  ClusterStore,
  type EquivalenceOracle,
  exactPass,
} from "@/clustering";
import type { TextNormalizer } from "@/normalize";
import type { TaxonomyClassifier } from "@/taxonomy";
import type { Cluster, DreamRecord, PipelineConfig } from "@/types";
import type { StatusBoard } from "./status";

export interface PipelineDependencies {
  normalizer: TextNormalizer;
  judge: EquivalenceOracle;
  classifier: TaxonomyClassifier;
  checkpoint: CheckpointManager;
  status?: StatusBoard;
  config?: Partial<PipelineConfig>;
}

export interface PipelineRunResult {
  records: DreamRecord[];
  clusters: Cluster[];
  /** Stage the run resumed from, or null for a fresh start */
  resumedFrom: PipelineStage | null;
  merges: number;
}

const DEFAULT_CONFIG: PipelineConfig = {
  checkpointEvery: 100,
  mergeWindow: 20,
  prefixLength: 2,
};

export class PipelineRunner {
  private config: PipelineConfig;

  constructor(private deps: PipelineDependencies) {
    this.config = { ...DEFAULT_CONFIG, ...deps.config };
  }

  /**
   * Run (or resume) the pipeline over the given corpus.
   *
   * @throws {CheckpointError} when a checkpoint cannot be written or read
   */
  async run(corpus: DreamRecord[]): Promise<PipelineRunResult> {
    let state = this.deps.checkpoint.load();
    const resumedFrom =
      state.records.length > 0 || state.stage !== "normalize"
        ? state.stage
        : null;
    if (resumedFrom) {
      console.error(
        `[dreamgroup] Resuming from checkpoint at stage "${state.stage}"`,
      );
    }

    state = this.admitNewRecords(state, corpus);
    let merges = 0;

    if (state.stage === "normalize") {
      state = await this.normalizeStage(state, corpus);
    }
    if (state.stage === "exact") {
      state = this.exactStage(state);
    }
    if (state.stage === "merge") {
      const result = await this.mergeStage(state);
      state = result.state;
      merges = result.merges;
    }
    if (state.stage === "classify") {
      state = await this.classifyStage(state);
    }

    this.deps.status?.publish({
      stage: "done",
      processed: state.clusters.length,
      total: state.clusters.length,
    });

    return {
      records: state.records,
      clusters: state.clusters,
      resumedFrom,
      merges,
    };
  }

  /**
   * Corpus records the checkpoint has never seen send a later-stage run
   * back to normalize. Normalized records are kept; the groups are rebuilt.
   */
  private admitNewRecords(
    state: CheckpointState,
    corpus: DreamRecord[],
  ): CheckpointState {
    if (state.stage === "normalize") {
      return state;
    }

    const processed = new Set(state.processedIds);
    const added = corpus.filter(
      (r) => r.rawTitle.trim().length > 0 && !processed.has(r.id),
    ).length;
    if (added === 0) {
      return state;
    }

    console.error(
      `[dreamgroup] ${added} new records since stage "${state.stage}", regrouping`,
    );
    return {
      ...state,
      stage: "normalize",
      clusters: [],
      mergeCursor: 0,
      classifiedIds: [],
    };
  }

  private async normalizeStage(
    state: CheckpointState,
    corpus: DreamRecord[],
  ): Promise<CheckpointState> {
    const previous = new Map(state.records.map((r) => [r.id, r]));
    const processed = new Set(state.processedIds);

    const records = corpus
      .filter((r) => r.rawTitle.trim().length > 0)
      .map((r) => {
        const saved = previous.get(r.id);
        return processed.has(r.id) && saved ? { ...saved } : { ...r };
      });

    const pending = records.filter((r) => !processed.has(r.id));
    console.error(
      `[dreamgroup] Normalizing ${pending.length} of ${records.length} records`,
    );
    this.report("normalize", processed.size, records.length);

    let sinceSave = 0;
    for (const record of pending) {
      record.normalizedPhrase = await this.deps.normalizer.normalize(
        record.rawTitle,
      );
      processed.add(record.id);
      sinceSave++;

      if (sinceSave >= this.config.checkpointEvery) {
        this.save({
          ...state,
          stage: "normalize",
          records,
          processedIds: Array.from(processed),
        });
        sinceSave = 0;
        console.error(
          `[dreamgroup] Normalized ${processed.size}/${records.length}`,
        );
      }
      this.report("normalize", processed.size, records.length);
    }

    return this.save({
      ...state,
      stage: "exact",
      records,
      processedIds: Array.from(processed),
    });
  }

  private exactStage(state: CheckpointState): CheckpointState {
    const store = exactPass(state.records);
    console.error(
      `[dreamgroup] Exact pass: ${state.records.length} records in ${store.size} clusters`,
    );
    const snapshot = store.snapshot();
    return this.save({
      ...state,
      stage: "merge",
      records: snapshot.records,
      clusters: snapshot.clusters,
      mergeCursor: 0,
    });
  }

  private async mergeStage(
    state: CheckpointState,
  ): Promise<{ state: CheckpointState; merges: number }> {
    const store = ClusterStore.fromSnapshot(state);
    const engine = new ClusteringEngine(this.deps.judge, {
      window: this.config.mergeWindow,
      prefixLength: this.config.prefixLength,
    });
    const total = store.size;
    this.report("merge", state.mergeCursor, total);

    let lastSaved = state.mergeCursor;
    const stats = await engine.mergePass(store, {
      startCursor: state.mergeCursor,
      onProgress: (cursor, current) => {
        this.report("merge", cursor, total);
        if (cursor - lastSaved >= this.config.checkpointEvery) {
          const snapshot = current.snapshot();
          this.save({
            ...state,
            stage: "merge",
            records: snapshot.records,
            clusters: snapshot.clusters,
            mergeCursor: cursor,
          });
          lastSaved = cursor;
        }
      },
    });

    console.error(
      `[dreamgroup] Merge pass: ${stats.merges} merges, ${stats.comparisons} comparisons, ${stats.skippedByPrefilter} skipped, ${store.size} clusters left`,
    );

    const snapshot = store.snapshot();
    return {
      state: this.save({
        ...state,
        stage: "classify",
        records: snapshot.records,
        clusters: snapshot.clusters,
        mergeCursor: stats.finalCursor,
      }),
      merges: stats.merges,
    };
  }

  private async classifyStage(
    state: CheckpointState,
  ): Promise<CheckpointState> {
    const store = ClusterStore.fromSnapshot(state);
    const classified = new Set(state.classifiedIds);
    const clusters = store.list();
    this.report("classify", classified.size, clusters.length);

    let sinceSave = 0;
    for (const cluster of clusters) {
      if (classified.has(cluster.id) && cluster.taxonomy) continue;

      const taxonomy = await this.deps.classifier.classify(
        cluster.representative,
      );
      store.setTaxonomy(cluster.id, taxonomy);
      classified.add(cluster.id);
      sinceSave++;

      if (sinceSave >= this.config.checkpointEvery) {
        this.save({
          ...state,
          stage: "classify",
          clusters: store.snapshot().clusters,
          classifiedIds: Array.from(classified),
        });
        sinceSave = 0;
      }
      this.report("classify", classified.size, clusters.length);
    }

    return this.save({
      ...state,
      stage: "done",
      clusters: store.snapshot().clusters,
      classifiedIds: Array.from(classified),
    });
  }

  private save(state: CheckpointState): CheckpointState {
    this.deps.checkpoint.save(state);
    return state;
  }

  private report(stage: PipelineStage, processed: number, total: number) {
    this.deps.status?.publish({ stage, processed, total });
  }
}
