// ──────────────────────────────────────────────
// Strand - Embed & Index Activity
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ActivityDefinition, IndexingResult, VectorPoint, VectorStore } from "@strand/types";
import { measureDuration, startTimer } from "@strand/utils";
import type { Embedder } from "../embedder.js";
import { parseArgs } from "./args.js";

export const EMBED_AND_INDEX_ACTIVITY = "embed_and_index_activity";

const argsSchema = z.tuple([
  z.array(
    z.object({
      id: z.string(),
      text: z.string(),
      metadata: z.record(z.unknown()).optional(),
    })
  ),
  z.string().min(1),
]);

export interface EmbedAndIndexDeps {
  vectorStore: VectorStore;
  embedder: Embedder;
}

export function createEmbedAndIndexActivity(deps: EmbedAndIndexDeps): ActivityDefinition {
  return {
    name: EMBED_AND_INDEX_ACTIVITY,
    description: "Embed document chunks and upsert them into a vector collection",
    timeoutSeconds: 600,
    retryAttempts: 3,
    parameters: [
      { name: "chunks", type: "list", description: "Chunk records with id and text", required: true },
      { name: "collection", type: "string", description: "Target vector collection", required: true },
    ],
    returns: { type: "object", description: "Indexing summary with indexed_count and collection_name" },

    async run(args, context) {
      const [chunks, collection] = parseArgs(EMBED_AND_INDEX_ACTIVITY, argsSchema, args);
      const timer = startTimer();

      const points: VectorPoint[] = chunks.map((chunk) => ({
        id: chunk.id,
        text: chunk.text,
        vector: deps.embedder.embed(chunk.text),
        metadata: { ...chunk.metadata, indexed_at: new Date().toISOString() },
      }));

      context.signal.throwIfAborted();
      await deps.vectorStore.upsert(collection, points);

      const result: IndexingResult = {
        status: "success",
        indexed_count: points.length,
        collection_name: collection,
        embedding_model: deps.embedder.model,
        elapsed_ms: measureDuration(timer),
      };
      context.logger.info("Chunks indexed", { collection, indexedCount: result.indexed_count });
      return result;
    },
  };
}
