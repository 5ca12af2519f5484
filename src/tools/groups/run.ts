import { isAbsolute, join } from "node:path";
import { z } from "zod";
import type { DreamGroupSession } from "@/session";

export const RunPipelineInputSchema = z.object({
  corpusPath: z
    .string()
    .describe("Corpus file (.tsv, .csv or .json), relative to the project"),
  fresh: z
    .boolean()
    .default(false)
    .describe("Discard the checkpoint and start from scratch"),
});

export type RunPipelineInput = z.infer<typeof RunPipelineInputSchema>;

export interface RunPipelineResult {
  started: boolean;
  message: string;
}

export function runPipeline(
  input: RunPipelineInput,
  session: DreamGroupSession,
  projectPath: string,
): RunPipelineResult {
  const corpusPath = isAbsolute(input.corpusPath)
    ? input.corpusPath
    : join(projectPath, input.corpusPath);

  const started = session.startRun(corpusPath, { fresh: input.fresh });
  return started
    ? { started, message: `Run started for ${corpusPath}` }
    : { started, message: "A run is already in progress" };
}
