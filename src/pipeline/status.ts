/**
 * Progress status board
 *
 * One writer (the pipeline) publishes whole frozen snapshots; readers take
 * whatever snapshot is current and never see a half-applied update.
 */

import type { PipelineStage } from "@/checkpoint";

export type StatusStage = PipelineStage | "idle" | "loading";

export interface ProgressSnapshot {
  readonly runId: string | null;
  readonly stage: StatusStage;
  readonly processed: number;
  readonly total: number;
  readonly running: boolean;
  readonly lastError: string | null;
  readonly updatedAt: string;
}

export type ProgressUpdate = Partial<Omit<ProgressSnapshot, "updatedAt">>;

export class StatusBoard {
  private snapshot: ProgressSnapshot;

  constructor(private now: () => Date = () => new Date()) {
    this.snapshot = Object.freeze({
      runId: null,
      stage: "idle",
      processed: 0,
      total: 0,
      running: false,
      lastError: null,
      updatedAt: this.now().toISOString(),
    });
  }

  current(): ProgressSnapshot {
    return this.snapshot;
  }

  publish(update: ProgressUpdate): ProgressSnapshot {
    this.snapshot = Object.freeze({
      ...this.snapshot,
      ...update,
      updatedAt: this.now().toISOString(),
    });
    return this.snapshot;
  }
}
