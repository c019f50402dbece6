// ──────────────────────────────────────────────
// Strand - Search Documents Activity
// ──────────────────────────────────────────────

import { z } from "zod";
import type { ActivityDefinition, SearchResult, VectorStore } from "@strand/types";
import { measureDuration, startTimer } from "@strand/utils";
import type { Embedder } from "../embedder.js";
import { parseArgs } from "./args.js";

export const SEARCH_DOCUMENTS_ACTIVITY = "search_documents_activity";
export const DEFAULT_SEARCH_TOP_K = 5;

const searchTuple = z.union([
  z.tuple([z.string(), z.string().min(1)]),
  z.tuple([z.string(), z.string().min(1), z.number().int().positive()]),
]);

// Direct [query, collection, topK?] or a single packed list.
const argsSchema = z.union([searchTuple, z.tuple([searchTuple])]);

export interface SearchDocumentsDeps {
  vectorStore: VectorStore;
  embedder: Embedder;
}

export function createSearchDocumentsActivity(deps: SearchDocumentsDeps): ActivityDefinition {
  return {
    name: SEARCH_DOCUMENTS_ACTIVITY,
    description: "Embed a query and return the closest chunks in a collection",
    timeoutSeconds: 120,
    retryAttempts: 3,
    parameters: [
      { name: "query", type: "string", description: "Search text", required: true },
      { name: "collection", type: "string", description: "Vector collection to search", required: true },
      { name: "top_k", type: "integer", description: `Maximum matches (default ${DEFAULT_SEARCH_TOP_K})`, required: false },
    ],
    returns: { type: "object", description: "Search summary with retrieved_documents" },

    async run(args, context) {
      const parsed = parseArgs(SEARCH_DOCUMENTS_ACTIVITY, argsSchema, args);
      const [query, collection, topK = DEFAULT_SEARCH_TOP_K] = parsed.length === 1 ? parsed[0] : parsed;
      const timer = startTimer();

      const matches = await deps.vectorStore.search(collection, deps.embedder.embed(query), topK);

      const result: SearchResult = {
        status: "success",
        query,
        retrieved_documents: matches,
        total_results: matches.length,
        collection_name: collection,
        elapsed_ms: measureDuration(timer),
      };
      context.logger.info("Documents retrieved", { collection, topK, totalResults: matches.length });
      return result;
    },
  };
}
