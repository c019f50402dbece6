// ──────────────────────────────────────────────
// Strand - Activities
// ──────────────────────────────────────────────

export { createHashEmbedder, HASH_EMBEDDING_MODEL, DEFAULT_EMBEDDING_DIMENSIONS } from "./embedder.js";
export type { Embedder } from "./embedder.js";
export * from "./vector-store/index.js";
export { windowText, splitParagraphs, DEFAULT_MAX_CHUNK_CHARS, DEFAULT_OVERLAP_CHARS } from "./text.js";
export type { ChunkingOptions } from "./text.js";
export { hashEmbedding, cosineSimilarity, toVector } from "./similarity.js";
export { createChunkDocumentsActivity, CHUNK_DOCUMENTS_ACTIVITY } from "./definitions/chunk-documents.js";
export type { ChunkDocumentsOptions } from "./definitions/chunk-documents.js";
export { createEmbedAndIndexActivity, EMBED_AND_INDEX_ACTIVITY } from "./definitions/embed-and-index.js";
export {
  createSearchDocumentsActivity,
  SEARCH_DOCUMENTS_ACTIVITY,
  DEFAULT_SEARCH_TOP_K,
} from "./definitions/search-documents.js";
export { healthCheckActivity, HEALTH_CHECK_ACTIVITY } from "./definitions/health-check.js";
export { createActivityCatalog, selectActivities } from "./catalog.js";
export type { ActivityCatalogDeps } from "./catalog.js";
