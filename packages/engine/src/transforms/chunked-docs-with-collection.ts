// ──────────────────────────────────────────────
// Strand - ChunkedDocsWithCollection Transform
// Pairs a chunk list with the target collection name
// ──────────────────────────────────────────────

import { TransformError, isNonEmptyString, isRecord } from "@strand/utils";
import type { TransformDefinition } from "./types.js";

export const CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM = "chunked_docs_with_collection";

function isCanonical(data: unknown[]): boolean {
  return data.length === 2 && Array.isArray(data[0]) && typeof data[1] === "string";
}

function unwrap(data: unknown[]): unknown[] {
  let current = data;
  while (current.length === 1) {
    const inner = current[0];
    if (!Array.isArray(inner)) break;
    current = inner;
  }
  return current;
}

export const chunkedDocsWithCollectionTransform: TransformDefinition = {
  name: CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM,
  description: "Unwraps nested chunk lists and pairs them with the collection from the run input",
  apply: (data, _step, originalInput, defaultCollection) => {
    if (Array.isArray(data) && isCanonical(data)) return data;

    const requested = isRecord(originalInput) ? originalInput["collection"] : undefined;
    const collection = isNonEmptyString(requested) ? requested : defaultCollection;

    if (data === null || data === undefined) return [[], collection];
    if (!Array.isArray(data)) {
      throw new TransformError(
        CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM,
        `expected a list of chunks, got ${typeof data}`
      );
    }

    return [unwrap(data), collection];
  },
};
