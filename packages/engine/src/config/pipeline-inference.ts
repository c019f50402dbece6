// ──────────────────────────────────────────────
// Strand - Pipeline Inference
// Best-effort pipeline shapes from discovered activity names
// ──────────────────────────────────────────────

import type { PipelineDefinition } from "@strand/types";
import { CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM } from "../transforms/chunked-docs-with-collection.js";
import { DOCUMENTS_TRANSFORM } from "../transforms/documents.js";
import { PASSTHROUGH_TRANSFORM } from "../transforms/passthrough.js";
import { QUERY_WITH_COLLECTION_TRANSFORM } from "../transforms/query-with-collection.js";

export const DOCUMENT_PROCESSING_PIPELINE = "document_processing";
export const DOCUMENT_RETRIEVAL_PIPELINE = "document_retrieval";
export const HEALTH_CHECK_PIPELINE = "health_check";

const INFERRED_DESCRIPTION = "Inferred from discovered activities";

function findFirst(names: readonly string[], fragments: string[], exclude?: string): string | undefined {
  return names.find(
    (name) => name !== exclude && fragments.some((fragment) => name.toLowerCase().includes(fragment))
  );
}

/**
 * `activityNames` is in preference order; the first match wins for every
 * pipeline shape. A shape with no matching activity is omitted.
 */
export function inferPipelines(activityNames: readonly string[]): PipelineDefinition[] {
  const pipelines: PipelineDefinition[] = [];

  const chunk = findFirst(activityNames, ["chunk"]);
  const embed = chunk ? findFirst(activityNames, ["embedding", "index"], chunk) : undefined;
  if (chunk && embed) {
    pipelines.push({
      name: DOCUMENT_PROCESSING_PIPELINE,
      displayName: "Document Processing",
      description: INFERRED_DESCRIPTION,
      origin: "inferred",
      steps: [
        { activityName: chunk, transformName: DOCUMENTS_TRANSFORM },
        { activityName: embed, transformName: CHUNKED_DOCS_WITH_COLLECTION_TRANSFORM },
      ],
    });
  }

  const search = findFirst(activityNames, ["search"]);
  if (search) {
    pipelines.push({
      name: DOCUMENT_RETRIEVAL_PIPELINE,
      displayName: "Document Retrieval",
      description: INFERRED_DESCRIPTION,
      origin: "inferred",
      steps: [{ activityName: search, transformName: QUERY_WITH_COLLECTION_TRANSFORM }],
    });
  }

  const health = findFirst(activityNames, ["health"]);
  if (health) {
    pipelines.push({
      name: HEALTH_CHECK_PIPELINE,
      displayName: "Health Check",
      description: INFERRED_DESCRIPTION,
      origin: "inferred",
      steps: [{ activityName: health, transformName: PASSTHROUGH_TRANSFORM }],
    });
  }

  return pipelines;
}
