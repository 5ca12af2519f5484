import { nanoid } from "nanoid";
import type { StatusBoard } from "./status";

export type PipelineTask = (runId: string) => Promise<unknown>;

/**
 * Runs at most one pipeline task at a time in the background.
 * Failures end up in the status board's lastError.
 */
export class PipelineWorker {
  private active: Promise<void> | null = null;

  constructor(private board: StatusBoard) {}

  get running(): boolean {
    return this.active !== null;
  }

  /**
   * @returns false when a run is already in progress
   */
  start(task: PipelineTask): boolean {
    if (this.active) {
      return false;
    }

    const runId = nanoid(10);
    this.board.publish({
      runId,
      stage: "loading",
      processed: 0,
      total: 0,
      running: true,
      lastError: null,
    });

    this.active = task(runId)
      .then(() => undefined)
      .catch((error: unknown) => {
        const message = error instanceof Error ? error.message : String(error);
        console.error(`[dreamgroup] Run ${runId} failed:`, error);
        this.board.publish({ lastError: message });
      })
      .finally(() => {
        this.board.publish({ running: false });
        this.active = null;
      });

    return true;
  }

  /**
   * Resolves once the current run (if any) has settled
   */
  async waitForIdle(): Promise<void> {
    if (this.active) {
      await this.active;
    }
  }
}
