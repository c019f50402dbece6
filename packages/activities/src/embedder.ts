// ──────────────────────────────────────────────
// Strand - Hash Embedder
// Deterministic embeddings, no model download
// ──────────────────────────────────────────────

import { hashEmbedding } from "./similarity.js";

export const HASH_EMBEDDING_MODEL = "strand-hash-v1";
export const DEFAULT_EMBEDDING_DIMENSIONS = 64;

export interface Embedder {
  readonly model: string;
  readonly dimensions: number;
  embed(text: string): number[];
}

export function createHashEmbedder(dimensions = DEFAULT_EMBEDDING_DIMENSIONS): Embedder {
  return {
    model: HASH_EMBEDDING_MODEL,
    dimensions,
    embed: (text) => hashEmbedding(text, dimensions),
  };
}
