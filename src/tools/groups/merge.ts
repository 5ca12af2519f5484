import { z } from "zod";
import type { DreamGroupSession } from "@/session";
import type { Cluster } from "@/types";

export const MergeClustersInputSchema = z.object({
  targetId: z.string().describe("Cluster that keeps its representative"),
  sourceIds: z
    .array(z.string())
    .min(1)
    .describe("Clusters folded into the target"),
});

export type MergeClustersInput = z.infer<typeof MergeClustersInputSchema>;

export function mergeClusterGroups(
  input: MergeClustersInput,
  session: DreamGroupSession,
): Cluster {
  return session.merge(input.targetId, input.sourceIds);
}
