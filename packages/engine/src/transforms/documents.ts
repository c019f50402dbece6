// ──────────────────────────────────────────────
// Strand - Documents Transform
// ──────────────────────────────────────────────

import { TransformError, isRecord } from "@strand/utils";
import type { TransformDefinition } from "./types.js";

export const DOCUMENTS_TRANSFORM = "documents";

const LIST_KEYS = ["retrieved_documents", "documents"] as const;

export const documentsTransform: TransformDefinition = {
  name: DOCUMENTS_TRANSFORM,
  description: "Extracts a flat list of document records from a search result, envelope or record",
  apply: (data) => {
    if (data === null || data === undefined) return [];
    if (Array.isArray(data)) return data;

    if (isRecord(data)) {
      for (const key of LIST_KEYS) {
        if (!(key in data)) continue;
        const list = data[key];
        if (!Array.isArray(list)) {
          throw new TransformError(DOCUMENTS_TRANSFORM, `"${key}" must be a list, got ${typeof list}`);
        }
        return list;
      }
    }

    return [data];
  },
};
