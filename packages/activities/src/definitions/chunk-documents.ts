// ──────────────────────────────────────────────
// Strand - Chunk Documents Activity
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ActivityDefinition, ChunkRecord } from "@strand/types";
import { generateId } from "@strand/utils";
import { DEFAULT_MAX_CHUNK_CHARS, DEFAULT_OVERLAP_CHARS, splitParagraphs } from "../text.js";
import type { ChunkingOptions } from "../text.js";
import { parseArgs } from "./args.js";

export const CHUNK_DOCUMENTS_ACTIVITY = "chunk_documents_activity";

const documentsSchema = z.array(
  z.object({
    id: z.string(),
    text: z.string(),
    metadata: z.record(z.unknown()).optional(),
  })
);

export interface ChunkDocumentsOptions {
  maxChunkChars?: number;
  overlapChars?: number;
}

export function createChunkDocumentsActivity(options: ChunkDocumentsOptions = {}): ActivityDefinition {
  const chunking: ChunkingOptions = {
    maxChunkChars: options.maxChunkChars ?? DEFAULT_MAX_CHUNK_CHARS,
    overlapChars: options.overlapChars ?? DEFAULT_OVERLAP_CHARS,
  };

  return {
    name: CHUNK_DOCUMENTS_ACTIVITY,
    description: "Split documents into paragraph chunks ready for embedding",
    timeoutSeconds: 300,
    retryAttempts: 3,
    parameters: [
      { name: "documents", type: "list", description: "Documents with id, text and optional metadata", required: true },
    ],
    returns: { type: "list", description: "Chunk records with id, text and chunk metadata" },

    async run(args, context) {
      const documents = parseArgs(CHUNK_DOCUMENTS_ACTIVITY, documentsSchema, args);
      const chunks: ChunkRecord[] = [];

      for (const doc of documents) {
        const pieces = splitParagraphs(doc.text, chunking);
        pieces.forEach((text, index) => {
          chunks.push({
            id: generateId(),
            text,
            metadata: {
              ...doc.metadata,
              original_doc_id: doc.id,
              chunk_index: index,
              total_chunks: pieces.length,
            },
          });
        });
      }

      context.logger.info("Documents chunked", { documents: documents.length, chunks: chunks.length });
      return chunks;
    },
  };
}
