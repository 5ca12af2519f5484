import type { Cluster, DreamRecord, TaxonomyPath } from "@/types";

export interface ClusterSize {
  id: string;
  representative: string;
  memberCount: number;
  taxonomy?: TaxonomyPath;
}

export interface RunSummary {
  totalRecords: number;
  normalizedRecords: number;
  totalClusters: number;
  singletonClusters: number;
  averageClusterSize: number;
  largestClusters: ClusterSize[];
  /** Level-1 category -> number of records */
  categoryDistribution: Record<string, number>;
}

export function summarizeRun(
  records: DreamRecord[],
  clusters: Cluster[],
  topN: number = 10,
): RunSummary {
  const memberTotal = clusters.reduce((sum, c) => sum + c.memberIds.length, 0);
  const categoryDistribution: Record<string, number> = {};

  for (const cluster of clusters) {
    const category = cluster.taxonomy?.level1 ?? "Unclassified";
    categoryDistribution[category] =
      (categoryDistribution[category] ?? 0) + cluster.memberIds.length;
  }

  const largestClusters = clusters
    .map((c) => ({
      id: c.id,
      representative: c.representative,
      memberCount: c.memberIds.length,
      taxonomy: c.taxonomy,
    }))
    .sort(
      (a, b) =>
        b.memberCount - a.memberCount || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0),
    )
    .slice(0, topN);

  return {
    totalRecords: records.length,
    normalizedRecords: records.filter((r) => r.normalizedPhrase !== undefined)
      .length,
    totalClusters: clusters.length,
    singletonClusters: clusters.filter((c) => c.memberIds.length === 1).length,
    averageClusterSize:
      clusters.length === 0
        ? 0
        : Math.round((memberTotal / clusters.length) * 100) / 100,
    largestClusters,
    categoryDistribution,
  };
}
