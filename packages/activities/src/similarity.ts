import { createHash } from "node:crypto";

/** Expands sha256 digests of `round:text` into values in [-1, 1]. */
export function hashEmbedding(text: string, dimensions: number): number[] {
  const vector: number[] = [];
  for (let round = 0; vector.length < dimensions; round++) {
    const digest = createHash("sha256").update(`${round}:${text}`).digest();
    for (const byte of digest.subarray(0, dimensions - vector.length)) {
      vector.push(byte / 127.5 - 1);
    }
  }
  return vector;
}

/** 0 for empty, mismatched or zero-length vectors. */
export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  a.forEach((x, i) => {
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  });

  return normA === 0 || normB === 0 ? 0 : dot / Math.sqrt(normA * normB);
}

/** Stored JSONB embeddings are trusted only as far as their finite numbers. */
export function toVector(value: unknown): number[] {
  if (!Array.isArray(value)) return [];
  return value.filter((item): item is number => typeof item === "number" && Number.isFinite(item));
}
