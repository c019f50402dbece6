export type { TransformFn, TransformDefinition } from "./types.js";
export { createTransformRegistry, BUILTIN_TRANSFORMS } from "./registry.js";
export type { TransformRegistry } from "./registry.js";
export { PASSTHROUGH_TRANSFORM, passthroughTransform } from "./passthrough.js";
export {
  QUERY_WITH_COLLECTION_TRANSFORM,
  DEFAULT_TOP_K,
  queryWithCollectionTransform,
} from "./query-with-collection.js";
export { DOCUMENTS_TRANSFORM, documentsTransform } from "./documents.js";
export {
  CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM,
  chunkedDocsWithCollectionTransform,
} from "./chunked-docs-with-collection.js";
