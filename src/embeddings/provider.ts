import { z } from "zod";
import type { EmbeddingConfig } from "@/types";

export interface EmbeddingClient {
  embed(text: string): Promise<number[]>;
  embedBatch(texts: string[]): Promise<number[][]>;
}

export { CachedEmbeddingClient } from "./cached";

const VectorSchema = z.array(z.number());
// TEI answers [[...]] for any input, but some versions send a flat vector
const TEIResponseSchema = z.union([z.array(VectorSchema), VectorSchema]);
const OpenAIResponseSchema = z.object({
  data: z.array(z.object({ embedding: VectorSchema })),
});
const OllamaResponseSchema = z.object({ embedding: VectorSchema });

export function createEmbeddingClient(
  config: EmbeddingConfig,
): EmbeddingClient {
  switch (config.provider) {
    case "local":
      return new TEIEmbeddingClient(config.endpoint);
    case "openai":
      return new OpenAIEmbeddingClient(config.apiKey, config.model);
    case "ollama":
      return new OllamaEmbeddingClient(config.endpoint, config.model);
  }
}

/**
 * POST a JSON body and validate the JSON answer
 */
async function postJson<T>(
  label: string,
  url: string,
  body: unknown,
  schema: z.ZodType<T>,
  headers: Record<string, string> = {},
): Promise<T> {
  const response = await fetch(url, {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });
  if (!response.ok) {
    throw new Error(`${label} failed: ${response.statusText}`);
  }
  return schema.parse(await response.json());
}

function first(vectors: number[][], label: string): number[] {
  const [vector] = vectors;
  if (!vector) {
    throw new Error(`${label} returned no vectors`);
  }
  return vector;
}

/** HuggingFace Text Embeddings Inference */
class TEIEmbeddingClient implements EmbeddingClient {
  constructor(private endpoint: string) {}

  async embed(text: string): Promise<number[]> {
    return first(await this.request(text), "TEI embed");
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    return this.request(texts);
  }

  private async request(inputs: string | string[]): Promise<number[][]> {
    const result = await postJson(
      "TEI embed",
      `${this.endpoint}/embed`,
      { inputs },
      TEIResponseSchema,
    );
    const nested = z.array(VectorSchema).safeParse(result);
    return nested.success ? nested.data : [VectorSchema.parse(result)];
  }
}

class OpenAIEmbeddingClient implements EmbeddingClient {
  constructor(
    private apiKey: string,
    private model: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    return first(await this.embedBatch([text]), "OpenAI embed");
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    const result = await postJson(
      "OpenAI embed batch",
      "https://api.openai.com/v1/embeddings",
      { model: this.model, input: texts },
      OpenAIResponseSchema,
      { Authorization: `Bearer ${this.apiKey}` },
    );
    return result.data.map((d) => d.embedding);
  }
}

class OllamaEmbeddingClient implements EmbeddingClient {
  constructor(
    private endpoint: string,
    private model: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    const result = await postJson(
      "Ollama embed",
      `${this.endpoint}/api/embeddings`,
      { model: this.model, prompt: text },
      OllamaResponseSchema,
    );
    return result.embedding;
  }

  // No batch endpoint; one request per text, in order
  async embedBatch(texts: string[]): Promise<number[][]> {
    const embeddings: number[][] = [];
    for (const text of texts) {
      embeddings.push(await this.embed(text));
    }
    return embeddings;
  }
}
