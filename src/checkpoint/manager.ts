/**
 * Checkpoint Manager
 *
 * Persists the whole pipeline state as one JSON document. Saves go to a
 * temp file in the same directory which is then renamed over the target,
 * so an interrupted write leaves the previous checkpoint readable.
 */

import {
  existsSync,
  mkdirSync,
  readFileSync,
  renameSync,
  rmSync,
  writeFileSync,
} from "node:fs";
import { basename, dirname, join } from "node:path";
import { nanoid } from "nanoid";
import { z } from "zod";
import { ClusterSchema, DreamRecordSchema } from "@/types";
import { CheckpointError } from "./errors";

export const PipelineStageSchema = z.enum([
  "normalize",
  "exact",
  "merge",
  "classify",
  "done",
]);
export type PipelineStage = z.infer<typeof PipelineStageSchema>;

export const CHECKPOINT_VERSION = 1;

export const CheckpointStateSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  stage: PipelineStageSchema,
  records: z.array(DreamRecordSchema),
  /** Records whose normalizedPhrase is final */
  processedIds: z.array(z.string()),
  clusters: z.array(ClusterSchema),
  /** Next base index of the merge pass */
  mergeCursor: z.number().int().min(0),
  /** Clusters that already carry a taxonomy */
  classifiedIds: z.array(z.string()),
  savedAt: z.string().optional(),
});
export type CheckpointState = z.infer<typeof CheckpointStateSchema>;

/**
 * File operations used for saving; replaceable in tests
 */
export interface CheckpointIO {
  writeFile(path: string, data: string): void;
  rename(from: string, to: string): void;
}

const nodeIO: CheckpointIO = {
  writeFile: (path, data) => writeFileSync(path, data, "utf-8"),
  rename: (from, to) => renameSync(from, to),
};

export function emptyCheckpoint(): CheckpointState {
  return {
    version: CHECKPOINT_VERSION,
    stage: "normalize",
    records: [],
    processedIds: [],
    clusters: [],
    mergeCursor: 0,
    classifiedIds: [],
  };
}

export class CheckpointManager {
  private saves = 0;

  constructor(
    private path: string,
    private io: CheckpointIO = nodeIO,
  ) {}

  get saveCount(): number {
    return this.saves;
  }

  exists(): boolean {
    return existsSync(this.path);
  }

  /**
   * Latest saved state, or an empty state when nothing has been saved
   *
   * @throws {CheckpointError} if the file exists but cannot be read or parsed
   */
  load(): CheckpointState {
    if (!existsSync(this.path)) {
      return emptyCheckpoint();
    }

    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(this.path, "utf-8"));
    } catch (error) {
      throw new CheckpointError(
        `Failed to read checkpoint ${this.path}: ${describe(error)}`,
        this.path,
        error,
      );
    }

    const parsed = CheckpointStateSchema.safeParse(raw);
    if (!parsed.success) {
      throw new CheckpointError(
        `Invalid checkpoint ${this.path}: ${parsed.error.message}`,
        this.path,
        parsed.error,
      );
    }
    return parsed.data;
  }

  /**
   * Write the full state (never a delta)
   *
   * @throws {CheckpointError} on any I/O failure
   */
  save(state: CheckpointState): void {
    const directory = dirname(this.path);
    const tempPath = join(
      directory,
      `.${basename(this.path)}.${nanoid(8)}.tmp`,
    );
    const document: CheckpointState = {
      ...state,
      savedAt: new Date().toISOString(),
    };

    try {
      if (!existsSync(directory)) {
        mkdirSync(directory, { recursive: true });
      }
      this.io.writeFile(tempPath, JSON.stringify(document));
      this.io.rename(tempPath, this.path);
      this.saves++;
    } catch (error) {
      rmSync(tempPath, { force: true });
      throw new CheckpointError(
        `Failed to save checkpoint ${this.path}: ${describe(error)}`,
        this.path,
        error,
      );
    }
  }

  clear(): void {
    try {
      rmSync(this.path, { force: true });
    } catch (error) {
      throw new CheckpointError(
        `Failed to remove checkpoint ${this.path}: ${describe(error)}`,
        this.path,
        error,
      );
    }
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
