/**
 * Live cluster state
 *
 * Owns the records and the clusters they belong to. Every membership change
 * goes through here so record.clusterId and cluster.memberIds never disagree.
 */

import type { Cluster, DreamRecord, TaxonomyPath } from "@/types";

export interface ClusterSnapshot {
  records: DreamRecord[];
  clusters: Cluster[];
}

export interface PartitionIssue {
  recordId: string;
  problem: "unassigned" | "dangling" | "duplicated" | "mismatched";
}

function copyCluster(cluster: Cluster): Cluster {
  const copy: Cluster = {
    id: cluster.id,
    representative: cluster.representative,
    memberIds: [...cluster.memberIds],
  };
  if (cluster.taxonomy) {
    copy.taxonomy = { ...cluster.taxonomy };
  }
  return copy;
}

export class ClusterStore {
  private records = new Map<string, DreamRecord>();
  private clusters = new Map<string, Cluster>();

  constructor(records: DreamRecord[] = [], clusters: Cluster[] = []) {
    for (const record of records) {
      this.records.set(record.id, { ...record });
    }
    for (const cluster of clusters) {
      this.clusters.set(cluster.id, copyCluster(cluster));
    }
  }

  static fromSnapshot(snapshot: ClusterSnapshot): ClusterStore {
    return new ClusterStore(snapshot.records, snapshot.clusters);
  }

  get size(): number {
    return this.clusters.size;
  }

  has(clusterId: string): boolean {
    return this.clusters.has(clusterId);
  }

  get(clusterId: string): Cluster | undefined {
    return this.clusters.get(clusterId);
  }

  getRecord(recordId: string): DreamRecord | undefined {
    return this.records.get(recordId);
  }

  /**
   * Clusters in creation order
   */
  list(): Cluster[] {
    return Array.from(this.clusters.values());
  }

  listRecords(): DreamRecord[] {
    return Array.from(this.records.values());
  }

  addCluster(cluster: Cluster): void {
    if (this.clusters.has(cluster.id)) {
      throw new Error(`Cluster ${cluster.id} already exists`);
    }
    this.clusters.set(cluster.id, copyCluster(cluster));
    for (const memberId of cluster.memberIds) {
      const record = this.records.get(memberId);
      if (record) {
        record.clusterId = cluster.id;
      }
    }
  }

  /**
   * Merge `sourceId` into `targetId`: members are unioned, the target keeps
   * its representative, the source is deleted and its records repointed.
   */
  merge(targetId: string, sourceId: string): Cluster {
    if (targetId === sourceId) {
      throw new Error(`Cannot merge cluster ${targetId} into itself`);
    }

    const target = this.clusters.get(targetId);
    const source = this.clusters.get(sourceId);
    if (!target) {
      throw new Error(`Cluster not found: ${targetId}`);
    }
    if (!source) {
      throw new Error(`Cluster not found: ${sourceId}`);
    }

    const members = new Set(target.memberIds);
    for (const memberId of source.memberIds) {
      members.add(memberId);
      const record = this.records.get(memberId);
      if (record) {
        record.clusterId = targetId;
      }
    }

    target.memberIds = Array.from(members);
    this.clusters.delete(sourceId);
    return target;
  }

  setTaxonomy(clusterId: string, taxonomy: TaxonomyPath): void {
    const cluster = this.clusters.get(clusterId);
    if (!cluster) {
      throw new Error(`Cluster not found: ${clusterId}`);
    }
    cluster.taxonomy = { ...taxonomy };
  }

  /**
   * Deep copy of the current state, safe to serialize or hand to readers
   */
  snapshot(): ClusterSnapshot {
    return {
      records: this.listRecords().map((r) => ({ ...r })),
      clusters: this.list().map(copyCluster),
    };
  }

  /**
   * Every record must sit in exactly one live cluster, and its clusterId
   * must name that cluster. Returns the violations found.
   */
  checkPartition(): PartitionIssue[] {
    const issues: PartitionIssue[] = [];
    const owner = new Map<string, string>();

    for (const cluster of this.clusters.values()) {
      for (const memberId of cluster.memberIds) {
        if (owner.has(memberId)) {
          issues.push({ recordId: memberId, problem: "duplicated" });
        } else {
          owner.set(memberId, cluster.id);
        }
        if (!this.records.has(memberId)) {
          issues.push({ recordId: memberId, problem: "dangling" });
        }
      }
    }

    for (const record of this.records.values()) {
      const clusterId = owner.get(record.id);
      if (clusterId === undefined) {
        issues.push({ recordId: record.id, problem: "unassigned" });
      } else if (record.clusterId !== clusterId) {
        issues.push({ recordId: record.id, problem: "mismatched" });
      }
    }

    return issues;
  }
}
