/**
 * Similarity index build
 *
 * Embeds each distinct normalized phrase once and stores it with the
 * cluster it belonged to at build time.
 */

import { createHash } from "node:crypto";
import type { EmbeddingClient } from "@/embeddings/provider";
import type { DreamRecord } from "@/types";
import type { VectorStore } from "@/vectors";

const MIN_TEXT_LENGTH = 3;

export interface BuildIndexOptions {
  /** Texts sent to the embedding client per request */
  batchSize?: number;
  onProgress?: (indexed: number, total: number) => void;
}

export interface BuildIndexResult {
  indexed: number;
  skipped: number;
}

function cleanText(text: string): string {
  return text
    .trim()
    .replace(/^to\s+/i, "")
    .replace(/["'“”‘’]/g, "")
    .replace(/\s+/g, " ")
    .replace(/[^\p{L}\p{N}_\s\u0590-\u05FF.,!?-]/gu, "")
    .trim();
}

/**
 * Text embedded for a phrase: the cleaned raw title followed by the
 * cleaned phrase, or just one of them when they agree
 */
export function embeddingText(title: string, normalized: string): string {
  const cleanTitle = cleanText(title);
  const cleanPhrase = cleanText(normalized);

  if (cleanTitle.toLowerCase() === cleanPhrase.toLowerCase()) {
    return cleanTitle;
  }
  return `${cleanTitle} ${cleanPhrase}`.replace(/\s+/g, " ").trim();
}

export function phraseVectorId(phrase: string): string {
  return `phr_${createHash("sha256").update(phrase).digest("hex").slice(0, 24)}`;
}

export function normalizeVector(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  return norm === 0 ? vector : vector.map((v) => v / norm);
}

interface PendingPhrase {
  phrase: string;
  clusterId: string;
  text: string;
}

/**
 * Rebuild the vector index from assigned records
 */
export async function buildSimilarityIndex(
  records: DreamRecord[],
  embedder: EmbeddingClient,
  vectors: VectorStore,
  options: BuildIndexOptions = {},
): Promise<BuildIndexResult> {
  const batchSize = options.batchSize ?? 32;
  const pending: PendingPhrase[] = [];
  const seen = new Set<string>();
  let skipped = 0;

  for (const record of records) {
    const phrase = record.normalizedPhrase;
    if (!phrase || !record.clusterId || seen.has(phrase)) {
      continue;
    }
    seen.add(phrase);

    const text = embeddingText(record.rawTitle, phrase);
    if (text.length < MIN_TEXT_LENGTH) {
      skipped++;
      continue;
    }
    pending.push({ phrase, clusterId: record.clusterId, text });
  }

  await vectors.initialize();
  await vectors.clear();

  let indexed = 0;
  for (let start = 0; start < pending.length; start += batchSize) {
    const batch = pending.slice(start, start + batchSize);
    const embeddings = await embedder.embedBatch(batch.map((p) => p.text));
    if (embeddings.length !== batch.length) {
      throw new Error(
        `Embedding client returned ${embeddings.length} vectors for ${batch.length} texts`,
      );
    }

    for (let i = 0; i < batch.length; i++) {
      const item = batch[i];
      await vectors.upsert(
        phraseVectorId(item.phrase),
        normalizeVector(embeddings[i]),
        { phrase: item.phrase, clusterId: item.clusterId },
      );
      indexed++;
    }
    options.onProgress?.(indexed, pending.length);
  }

  return { indexed, skipped };
}
