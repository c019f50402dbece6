// ──────────────────────────────────────────────
// Strand - Postgres Vector Store
// JSONB embeddings, cosine similarity ranked in process
// ──────────────────────────────────────────────

import { eq, sql } from "drizzle-orm";
import type { Database } from "@strand/database";
import { vectorPoints } from "@strand/database";
import type { VectorStore } from "@strand/types";
import { createLogger, sanitizeErrorMessage } from "@strand/utils";
import { cosineSimilarity, toVector } from "../similarity.js";

const logger = createLogger("postgres-vector-store");

export interface PostgresVectorStoreOptions {
  embeddingModel: string;
  /** Upper bound on rows scored per search. */
  candidateLimit?: number;
}

export function createPostgresVectorStore(db: Database, options: PostgresVectorStoreOptions): VectorStore {
  const candidateLimit = options.candidateLimit ?? 5000;

  return {
    async upsert(collection, points) {
      if (points.length === 0) return;

      await db
        .insert(vectorPoints)
        .values(
          points.map((point) => ({
            collection,
            id: point.id,
            text: point.text,
            embedding: point.vector,
            embeddingModel: options.embeddingModel,
            metadata: point.metadata,
          }))
        )
        .onConflictDoUpdate({
          target: [vectorPoints.collection, vectorPoints.id],
          set: {
            text: sql`excluded.text`,
            embedding: sql`excluded.embedding`,
            embeddingModel: sql`excluded.embedding_model`,
            metadata: sql`excluded.metadata`,
            updatedAt: new Date(),
          },
        });

      logger.debug({ collection, count: points.length }, "Points upserted");
    },

    async search(collection, vector, topK) {
      const candidates = await db
        .select({ id: vectorPoints.id, text: vectorPoints.text, embedding: vectorPoints.embedding })
        .from(vectorPoints)
        .where(eq(vectorPoints.collection, collection))
        .limit(candidateLimit);

      return candidates
        .map((candidate) => ({
          id: candidate.id,
          text: candidate.text,
          score: cosineSimilarity(vector, toVector(candidate.embedding)),
        }))
        .sort((a, b) => b.score - a.score)
        .slice(0, topK);
    },

    async ping() {
      try {
        await db.execute(sql`select 1`);
        return true;
      } catch (err) {
        logger.warn({ error: sanitizeErrorMessage(err) }, "Vector store ping failed");
        return false;
      }
    },
  };
}
