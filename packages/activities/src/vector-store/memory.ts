// ──────────────────────────────────────────────
// Strand - In-Memory Vector Store
// ──────────────────────────────────────────────

import type { VectorMatch, VectorPoint, VectorStore } from "@strand/types";
import { createLogger } from "@strand/utils";
import { cosineSimilarity } from "../similarity.js";

const logger = createLogger("memory-vector-store");

export function createInMemoryVectorStore(): VectorStore {
  const collections = new Map<string, Map<string, VectorPoint>>();

  return {
    async upsert(collection, points) {
      let stored = collections.get(collection);
      if (!stored) {
        stored = new Map();
        collections.set(collection, stored);
      }
      for (const point of points) {
        stored.set(point.id, point);
      }
      logger.debug({ collection, count: points.length }, "Points upserted");
    },

    async search(collection, vector, topK) {
      const stored = collections.get(collection);
      if (!stored) return [];

      const matches: VectorMatch[] = Array.from(stored.values()).map((point) => ({
        id: point.id,
        text: point.text,
        score: cosineSimilarity(vector, point.vector),
      }));

      matches.sort((a, b) => b.score - a.score);
      return matches.slice(0, topK);
    },

    async ping() {
      return true;
    },
  };
}
