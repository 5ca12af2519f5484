import { differenceInYears, isValid, parseISO } from "date-fns";
import type { Cluster, DreamRecord } from "@/types";

export type AgeBand = "13-18" | "18-30" | "other";

/**
 * Whole years between an ISO birth date and the reference date,
 * or null when the birth date is missing or unparseable
 */
export function ageAt(
  birthDate: string | undefined,
  referenceDate: Date,
): number | null {
  if (!birthDate) {
    return null;
  }
  const born = parseISO(birthDate);
  if (!isValid(born)) {
    return null;
  }
  return differenceInYears(referenceDate, born);
}

export function ageBand(age: number | null): AgeBand {
  if (age === null) return "other";
  if (age >= 13 && age <= 18) return "13-18";
  if (age > 18 && age <= 30) return "18-30";
  return "other";
}

export interface BandCluster {
  clusterId: string;
  representative: string;
  /** Members of this cluster that fall in the band */
  count: number;
}

export interface BandSummary {
  records: number;
  topClusters: BandCluster[];
}

export function summarizeByAgeBand(
  records: DreamRecord[],
  clusters: Cluster[],
  referenceDate: Date,
  topN: number = 10,
): Record<AgeBand, BandSummary> {
  const representatives = new Map(clusters.map((c) => [c.id, c.representative]));
  const counts: Record<AgeBand, Map<string, number>> = {
    "13-18": new Map(),
    "18-30": new Map(),
    other: new Map(),
  };
  const totals: Record<AgeBand, number> = { "13-18": 0, "18-30": 0, other: 0 };

  for (const record of records) {
    const band = ageBand(ageAt(record.birthDate, referenceDate));
    totals[band]++;
    if (record.clusterId && representatives.has(record.clusterId)) {
      const bandCounts = counts[band];
      bandCounts.set(
        record.clusterId,
        (bandCounts.get(record.clusterId) ?? 0) + 1,
      );
    }
  }

  const summarize = (band: AgeBand): BandSummary => ({
    records: totals[band],
    topClusters: Array.from(counts[band].entries())
      .map(([clusterId, count]) => ({
        clusterId,
        representative: representatives.get(clusterId) ?? "",
        count,
      }))
      .sort(
        (a, b) =>
          b.count - a.count ||
          (a.clusterId < b.clusterId ? -1 : a.clusterId > b.clusterId ? 1 : 0),
      )
      .slice(0, topN),
  });

  return {
    "13-18": summarize("13-18"),
    "18-30": summarize("18-30"),
    other: summarize("other"),
  };
}
