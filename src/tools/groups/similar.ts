import { z } from "zod";
import type { DreamGroupSession } from "@/session";
import type { SimilarClustersResult } from "@/types";

export const FindSimilarInputSchema = z.object({
  clusterId: z.string().describe("Cluster to find look-alikes for"),
  limit: z
    .number()
    .int()
    .min(1)
    .max(50)
    .optional()
    .describe("Maximum results (default from config)"),
  threshold: z
    .number()
    .min(0)
    .max(100)
    .optional()
    .describe("Minimum similarity 0-100 (default from config)"),
});

export type FindSimilarInput = z.infer<typeof FindSimilarInputSchema>;

export async function findSimilarClusters(
  input: FindSimilarInput,
  session: DreamGroupSession,
): Promise<SimilarClustersResult> {
  return session.similar(input.clusterId, input.limit, input.threshold);
}
