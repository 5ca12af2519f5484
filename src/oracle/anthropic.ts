import Anthropic from "@anthropic-ai/sdk";
import type { CompletionOptions, TextOracle } from "./provider";

export interface AnthropicOracleOptions {
  apiKey: string;
  model: string;
}

/**
 * Oracle backed by the Anthropic Messages API
 */
export class AnthropicOracle implements TextOracle {
  private client: Anthropic;
  private model: string;

  constructor(options: AnthropicOracleOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey });
    this.model = options.model;
  }

  async complete(prompt: string, options: CompletionOptions): Promise<string> {
    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages: [{ role: "user", content: prompt }],
    });

    return response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
  }
}
