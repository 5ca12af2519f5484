import { z } from "zod";
import {
  type AgeBand,
  type BandSummary,
  type RunSummary,
  summarizeByAgeBand,
  summarizeRun,
} from "@/pipeline";
import type { DreamGroupSession } from "@/session";

export const ListClustersInputSchema = z.object({
  limit: z
    .number()
    .int()
    .min(1)
    .max(100)
    .default(10)
    .describe("Number of largest clusters to include"),
  byAgeBand: z
    .boolean()
    .default(false)
    .describe("Also break the largest clusters down by author age band"),
  referenceDate: z
    .string()
    .optional()
    .describe("ISO date ages are computed at (default: today)"),
});

export type ListClustersInput = z.infer<typeof ListClustersInputSchema>;

export interface ListClustersResult {
  summary: RunSummary;
  ageBands?: Record<AgeBand, BandSummary>;
}

export function listClusters(
  input: ListClustersInput,
  session: DreamGroupSession,
): ListClustersResult | null {
  const store = session.clusters();
  if (!store) {
    return null;
  }

  const records = store.listRecords();
  const clusters = store.list();
  const summary = summarizeRun(records, clusters, input.limit);
  if (!input.byAgeBand) {
    return { summary };
  }

  const referenceDate = input.referenceDate
    ? new Date(input.referenceDate)
    : new Date();
  return {
    summary,
    ageBands: summarizeByAgeBand(records, clusters, referenceDate, input.limit),
  };
}
