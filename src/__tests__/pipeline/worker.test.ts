import { describe, expect, it } from "vitest";
import { PipelineWorker, StatusBoard } from "../../pipeline";

describe("StatusBoard", () => {
  it("should start idle", () => {
    const board = new StatusBoard(() => new Date("2024-01-01T00:00:00Z"));

    expect(board.current()).toEqual({
      runId: null,
      stage: "idle",
      processed: 0,
      total: 0,
      running: false,
      lastError: null,
      updatedAt: "2024-01-01T00:00:00.000Z",
    });
  });

  it("should publish frozen snapshots", () => {
    const board = new StatusBoard();
    const before = board.current();

    const after = board.publish({ stage: "merge", processed: 3, total: 10 });

    expect(Object.isFrozen(after)).toBe(true);
    expect(before.stage).toBe("idle");
    expect(board.current()).toBe(after);
    expect(after).toMatchObject({ stage: "merge", processed: 3, total: 10 });
  });
});

describe("PipelineWorker", () => {
  it("should refuse a second run while one is active", async () => {
    const board = new StatusBoard();
    const worker = new PipelineWorker(board);
    let release: () => void = () => {};
    const task = () =>
      new Promise<void>((resolve) => {
        release = () => resolve();
      });

    expect(worker.start(task)).toBe(true);
    expect(worker.running).toBe(true);
    expect(board.current().running).toBe(true);
    expect(board.current().stage).toBe("loading");
    expect(worker.start(task)).toBe(false);

    release();
    await worker.waitForIdle();

    expect(worker.running).toBe(false);
    expect(board.current().running).toBe(false);
    expect(board.current().lastError).toBeNull();
  });

  it("should pass the published run id to the task", async () => {
    const board = new StatusBoard();
    const worker = new PipelineWorker(board);
    let seen = "";

    worker.start(async (runId) => {
      seen = runId;
    });
    await worker.waitForIdle();

    expect(seen).toHaveLength(10);
    expect(board.current().runId).toBe(seen);
  });

  it("should record a failed run", async () => {
    const board = new StatusBoard();
    const worker = new PipelineWorker(board);

    worker.start(async () => {
      throw new Error("corpus missing");
    });
    await worker.waitForIdle();

    expect(board.current().lastError).toBe("corpus missing");
    expect(board.current().running).toBe(false);
    expect(worker.start(async () => undefined)).toBe(true);
    await worker.waitForIdle();
    expect(board.current().lastError).toBeNull();
  });

  it("should resolve immediately when idle", async () => {
    const worker = new PipelineWorker(new StatusBoard());
    await expect(worker.waitForIdle()).resolves.toBeUndefined();
  });
});
