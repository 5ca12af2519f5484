import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { type Config, ConfigSchema, DEFAULT_CONFIG } from "./types";

const CONFIG_FILE = ".dreamgroup/config.json";

/**
 * Load configuration from file, falling back to defaults.
 * ANTHROPIC_API_KEY fills in the oracle key when the file leaves it out.
 */
export function loadConfig(projectPath: string = process.cwd()): Config {
  const configPath = join(projectPath, CONFIG_FILE);

  const config = existsSync(configPath)
    ? parseConfigFile(configPath)
    : structuredClone(DEFAULT_CONFIG);

  if (!config.oracle.apiKey && process.env.ANTHROPIC_API_KEY) {
    config.oracle.apiKey = process.env.ANTHROPIC_API_KEY;
  }

  return config;
}

function parseConfigFile(configPath: string): Config {
  try {
    const rawConfig = JSON.parse(readFileSync(configPath, "utf-8"));
    return ConfigSchema.parse(rawConfig);
  } catch (error) {
    if (error instanceof Error) {
      throw new Error(
        `Failed to load config from ${configPath}: ${error.message}`,
      );
    }
    throw error;
  }
}

export function getConfigPath(projectPath: string = process.cwd()): string {
  return join(projectPath, CONFIG_FILE);
}

export function getDbPath(
  config: Config,
  projectPath: string = process.cwd(),
): string {
  return join(projectPath, config.storage.dbPath);
}

export function getCheckpointPath(
  config: Config,
  projectPath: string = process.cwd(),
): string {
  return join(projectPath, config.storage.checkpointPath);
}

export function getProjectPath(): string {
  return process.cwd();
}
