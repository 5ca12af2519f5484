import type { OracleConfig } from "@/types";
import { AnthropicOracle } from "./anthropic";
import { PacedOracle } from "./paced";

export interface CompletionOptions {
  temperature: number;
  maxTokens: number;
}

/**
 * External text-generation service. Implementations may throw, return an
 * empty string, or return text in any shape; callers handle all three.
 */
export interface TextOracle {
  complete(prompt: string, options: CompletionOptions): Promise<string>;
}

/**
 * Create the configured oracle, or null when no API key is available.
 * Every stage treats a null oracle as "use the deterministic fallback".
 */
export function createOracle(config: OracleConfig): TextOracle | null {
  switch (config.provider) {
    case "anthropic": {
      if (!config.apiKey) {
        return null;
      }
      const client = new AnthropicOracle({
        apiKey: config.apiKey,
        model: config.model,
      });
      return config.callDelayMs > 0
        ? new PacedOracle(client, config.callDelayMs)
        : client;
    }
  }
}
