// ──────────────────────────────────────────────
// Strand - Activity Catalog
// Every activity a worker or the orchestrator can host
// ──────────────────────────────────────────────

import type { ActivityDefinition, VectorStore } from "@strand/types";
import { ConfigurationError } from "@strand/utils";
import type { Embedder } from "./embedder.js";
import { createHashEmbedder } from "./embedder.js";
import { createChunkDocumentsActivity } from "./definitions/chunk-documents.js";
import type { ChunkDocumentsOptions } from "./definitions/chunk-documents.js";
import { createEmbedAndIndexActivity } from "./definitions/embed-and-index.js";
import { createSearchDocumentsActivity } from "./definitions/search-documents.js";
import { healthCheckActivity } from "./definitions/health-check.js";

export interface ActivityCatalogDeps {
  vectorStore: VectorStore;
  embedder?: Embedder;
  chunking?: ChunkDocumentsOptions;
}

export function createActivityCatalog(deps: ActivityCatalogDeps): ActivityDefinition[] {
  const embedder = deps.embedder ?? createHashEmbedder();
  return [
    createChunkDocumentsActivity(deps.chunking),
    createEmbedAndIndexActivity({ vectorStore: deps.vectorStore, embedder }),
    createSearchDocumentsActivity({ vectorStore: deps.vectorStore, embedder }),
    healthCheckActivity,
  ];
}

/**
 * Picks the named activities in catalog order. An empty selection keeps the
 * whole catalog.
 */
export function selectActivities(catalog: ActivityDefinition[], names: string[]): ActivityDefinition[] {
  if (names.length === 0) return catalog;

  const known = new Set(catalog.map((activity) => activity.name));
  const unknown = names.filter((name) => !known.has(name));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `Unknown activities: ${unknown.join(", ")}. Available activities: ${[...known].join(", ")}`
    );
  }

  const wanted = new Set(names);
  return catalog.filter((activity) => wanted.has(activity.name));
}
