/**
 * Clustering Engine
 *
 * Two passes over normalized records:
 * 1. Exact pass: identical phrases share a cluster
 * 2. Merge pass: clusters sorted by representative are compared against a
 *    sliding window of their successors, and the oracle decides merges
 *
 * Merging is not transitive across windows: if A~B and B~C but C falls
 * outside A's window after sorting, A and C can stay apart.
 */

import type { Cluster, DreamRecord } from "@/types";
import { sharesPrefix } from "./prefilter";
import { ClusterStore } from "./store";

/**
 * Anything that can judge whether two phrases name the same goal
 */
export interface EquivalenceOracle {
  equivalent(a: string, b: string): Promise<boolean>;
}

/**
 * Configuration for the merge pass
 */
export interface ClusteringConfig {
  /** Number of following clusters compared against each cluster (1-200) */
  window: number;
  /** Leading characters of the first word that must agree; 0 disables */
  prefixLength: number;
}

const DEFAULT_CONFIG: ClusteringConfig = {
  window: 20,
  prefixLength: 2,
};

export interface MergePassOptions {
  /** Index into the sorted order to resume from */
  startCursor?: number;
  /** Called after each base cluster is finished, with the next cursor */
  onProgress?: (cursor: number, store: ClusterStore) => void | Promise<void>;
}

export interface MergePassStats {
  comparisons: number;
  skippedByPrefilter: number;
  merges: number;
  finalCursor: number;
}

export function clusterId(sequence: number): string {
  return `group_${String(sequence).padStart(5, "0")}`;
}

/**
 * Group records with byte-identical normalized phrases. Clusters are
 * created in first-occurrence order and numbered from 1.
 */
export function exactPass(records: DreamRecord[]): ClusterStore {
  const byPhrase = new Map<string, Cluster>();

  for (const record of records) {
    const phrase = record.normalizedPhrase;
    if (phrase === undefined) {
      throw new Error(`Record ${record.id} has not been normalized`);
    }

    let cluster = byPhrase.get(phrase);
    if (!cluster) {
      cluster = {
        id: clusterId(byPhrase.size + 1),
        representative: phrase,
        memberIds: [],
      };
      byPhrase.set(phrase, cluster);
    }
    cluster.memberIds.push(record.id);
  }

  const store = new ClusterStore(records);
  for (const cluster of byPhrase.values()) {
    store.addCluster(cluster);
  }
  return store;
}

/**
 * Sort order used by the merge pass: representative by code unit, then id
 */
export function sortedClusterIds(store: ClusterStore): string[] {
  return store
    .list()
    .slice()
    .sort((a, b) => {
      if (a.representative !== b.representative) {
        return a.representative < b.representative ? -1 : 1;
      }
      return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
    })
    .map((c) => c.id);
}

export class ClusteringEngine {
  private config: ClusteringConfig;

  constructor(
    private judge: EquivalenceOracle,
    config: Partial<ClusteringConfig> = {},
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    if (
      !Number.isInteger(this.config.window) ||
      this.config.window < 1 ||
      this.config.window > 200
    ) {
      throw new Error(
        `Merge window must be an integer between 1 and 200, got ${this.config.window}`,
      );
    }
  }

  /**
   * Windowed merge over the sorted cluster list.
   *
   * Merges only remove clusters after the current base and keep the
   * earlier representative, so the sorted prefix before the cursor is
   * stable and a saved cursor can be resumed against the saved store.
   */
  async mergePass(
    store: ClusterStore,
    options: MergePassOptions = {},
  ): Promise<MergePassStats> {
    const order = sortedClusterIds(store);
    const stats: MergePassStats = {
      comparisons: 0,
      skippedByPrefilter: 0,
      merges: 0,
      finalCursor: 0,
    };

    let i = Math.max(0, options.startCursor ?? 0);
    while (i < order.length) {
      const base = store.get(order[i]);
      if (!base) {
        throw new Error(`Cluster ${order[i]} vanished during merge pass`);
      }

      let j = i + 1;
      // Bound is recomputed each step: merges shrink the list
      while (j < Math.min(i + 1 + this.config.window, order.length)) {
        const other = store.get(order[j]);
        if (!other) {
          throw new Error(`Cluster ${order[j]} vanished during merge pass`);
        }

        if (
          !sharesPrefix(
            base.representative,
            other.representative,
            this.config.prefixLength,
          )
        ) {
          stats.skippedByPrefilter++;
          j++;
          continue;
        }

        stats.comparisons++;
        const same = await this.judge.equivalent(
          base.representative,
          other.representative,
        );

        if (same) {
          store.merge(base.id, other.id);
          order.splice(j, 1);
          stats.merges++;
        } else {
          j++;
        }
      }

      i++;
      if (options.onProgress) {
        await options.onProgress(i, store);
      }
    }

    stats.finalCursor = i;
    return stats;
  }
}

/**
 * Manual merge of several clusters into one target
 */
export function mergeClusters(
  store: ClusterStore,
  targetId: string,
  sourceIds: string[],
): Cluster {
  if (!store.has(targetId)) {
    throw new Error(`Cluster not found: ${targetId}`);
  }
  for (const sourceId of sourceIds) {
    if (sourceId === targetId) {
      throw new Error(`Cannot merge cluster ${targetId} into itself`);
    }
    if (!store.has(sourceId)) {
      throw new Error(`Cluster not found: ${sourceId}`);
    }
  }

  let target: Cluster | undefined = store.get(targetId);
  for (const sourceId of new Set(sourceIds)) {
    target = store.merge(targetId, sourceId);
  }
  if (!target) {
    throw new Error(`Cluster not found: ${targetId}`);
  }
  return target;
}
