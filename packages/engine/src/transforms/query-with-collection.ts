// ──────────────────────────────────────────────
// Strand - QueryWithCollection Transform
// Normalises any query shape to [query, collection, topK]
// ──────────────────────────────────────────────

import { TransformError, isRecord } from "@strand/utils";
import type { TransformDefinition } from "./types.js";

export const QUERY_WITH_COLLECTION_TRANSFORM = "query_with_collection";
export const DEFAULT_TOP_K = 10;

type QueryArgs = [query: string, collection: string, topK: number];

function fail(message: string): never {
  throw new TransformError(QUERY_WITH_COLLECTION_TRANSFORM, message);
}

function scalarToQuery(value: unknown): string | null {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return null;
}

function resolveCollection(value: unknown, defaultCollection: string): string {
  if (value === null || value === undefined || value === "") return defaultCollection;
  if (typeof value !== "string") {
    return fail(`collection must be a string, got ${typeof value}`);
  }
  return value;
}

function resolveTopK(value: unknown): number {
  if (value === null || value === undefined) return DEFAULT_TOP_K;
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) {
    return fail(`top_k must be a positive integer, got ${JSON.stringify(value)}`);
  }
  return value;
}

function normalize(data: unknown, defaultCollection: string): QueryArgs {
  const scalar = scalarToQuery(data);
  if (scalar !== null) {
    return [scalar, defaultCollection, DEFAULT_TOP_K];
  }

  if (Array.isArray(data)) {
    if (data.length === 0) return ["", defaultCollection, DEFAULT_TOP_K];
    // A one-element list is a wrapper around the real query value.
    if (data.length === 1) return normalize(data[0], defaultCollection);

    const query = scalarToQuery(data[0]);
    if (query === null) {
      return fail("first list element must be the query text");
    }
    return [query, resolveCollection(data[1], defaultCollection), resolveTopK(data[2])];
  }

  if (isRecord(data)) {
    const query = data["query"] ?? "";
    if (typeof query !== "string") {
      return fail(`query must be a string, got ${typeof query}`);
    }
    return [
      query,
      resolveCollection(data["collection"], defaultCollection),
      resolveTopK(data["top_k"]),
    ];
  }

  return fail(`unsupported input of type ${typeof data}`);
}

export const queryWithCollectionTransform: TransformDefinition = {
  name: QUERY_WITH_COLLECTION_TRANSFORM,
  description: "Normalises a query string, list or map into [query, collection, topK]",
  apply: (data, _step, _originalInput, defaultCollection) => normalize(data, defaultCollection),
};
