/**
 * Tests for config loading and path resolution
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  getCheckpointPath,
  getConfigPath,
  getDbPath,
  loadConfig,
} from "../../config";
import { ConfigSchema, DEFAULT_CONFIG } from "../../types";

describe("config", () => {
  let projectPath: string;

  beforeEach(() => {
    projectPath = mkdtempSync(join(tmpdir(), "dreamgroup-config-"));
    vi.stubEnv("ANTHROPIC_API_KEY", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    rmSync(projectPath, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): void {
    mkdirSync(join(projectPath, ".dreamgroup"), { recursive: true });
    writeFileSync(
      getConfigPath(projectPath),
      typeof content === "string" ? content : JSON.stringify(content),
    );
  }

  describe("loadConfig", () => {
    test("returns defaults without a config file", () => {
      expect(loadConfig(projectPath)).toEqual(DEFAULT_CONFIG);
    });

    test("does not share state with the defaults", () => {
      const config = loadConfig(projectPath);
      config.pipeline.mergeWindow = 5;
      expect(DEFAULT_CONFIG.pipeline.mergeWindow).toBe(20);
    });

    test("fills in section defaults from the file", () => {
      writeConfig({
        oracle: { provider: "anthropic", apiKey: "test-secret" },
        embedding: { provider: "local" },
        vector: { provider: "sqlite-vec" },
        storage: {
          dbPath: "data/results.db",
          checkpointPath: "data/checkpoint.json",
        },
        pipeline: { mergeWindow: 50 },
      });

      const config = loadConfig(projectPath);

      expect(config.oracle).toEqual({
        provider: "anthropic",
        apiKey: "test-secret",
        model: "claude-3-haiku-20240307",
        callDelayMs: 50,
      });
      expect(config.embedding).toEqual({
        provider: "local",
        endpoint: "http://localhost:8080",
      });
      expect(config.pipeline).toEqual({
        checkpointEvery: 100,
        mergeWindow: 50,
        prefixLength: 2,
      });
      expect(config.search).toEqual(DEFAULT_CONFIG.search);
    });

    test("takes the API key from the environment", () => {
      vi.stubEnv("ANTHROPIC_API_KEY", "test-secret");
      expect(loadConfig(projectPath).oracle.apiKey).toBe("test-secret");
    });

    test("rejects an out-of-range merge window", () => {
      writeConfig({
        ...DEFAULT_CONFIG,
        pipeline: { mergeWindow: 500 },
      });

      expect(() => loadConfig(projectPath)).toThrow(
        `Failed to load config from ${getConfigPath(projectPath)}`,
      );
    });

    test("rejects invalid JSON", () => {
      writeConfig("{ oracle: ");
      expect(() => loadConfig(projectPath)).toThrow(/Failed to load config/);
    });
  });

  describe("paths", () => {
    test("resolves paths against the project", () => {
      expect(getConfigPath("/srv/goals")).toBe(
        "/srv/goals/.dreamgroup/config.json",
      );
      expect(getDbPath(DEFAULT_CONFIG, "/srv/goals")).toBe(
        "/srv/goals/.dreamgroup/local.db",
      );
      expect(getCheckpointPath(DEFAULT_CONFIG, "/srv/goals")).toBe(
        "/srv/goals/.dreamgroup/checkpoint.json",
      );
    });
  });

  describe("ConfigSchema", () => {
    test("accepts the defaults", () => {
      expect(ConfigSchema.parse(DEFAULT_CONFIG)).toEqual(DEFAULT_CONFIG);
    });

    test("requires an API key for OpenAI embeddings", () => {
      const result = ConfigSchema.safeParse({
        ...DEFAULT_CONFIG,
        embedding: { provider: "openai" },
      });
      expect(result.success).toBe(false);
    });

    test("rejects a negative prefix length", () => {
      const result = ConfigSchema.safeParse({
        ...DEFAULT_CONFIG,
        pipeline: { ...DEFAULT_CONFIG.pipeline, prefixLength: -1 },
      });
      expect(result.success).toBe(false);
    });
  });
});
