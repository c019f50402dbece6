// ──────────────────────────────────────────────
// Strand - Zod Validation Schemas
// ──────────────────────────────────────────────

import { z } from "zod";

export const pipelineParamsSchema = z.object({
  pipelineName: z.string().min(1).max(255),
});

export const runParamsSchema = z.object({
  runId: z.string().min(1).max(255),
});

export const executePipelineSchema = z.object({
  input: z.unknown(),
  runId: z.string().min(1).max(255).optional(),
});

export const queryDocumentsSchema = z.object({
  query: z.string().min(1, "Query is required"),
  collection: z.string().min(1).max(255).optional(),
  top_k: z.number().int().min(1).max(100).optional(),
});

export const documentSchema = z.object({
  id: z.string().min(1),
  text: z.string(),
  metadata: z.record(z.unknown()).optional(),
});

export const indexDocumentsSchema = z.object({
  documents: z.array(documentSchema).min(1, "At least one document is required"),
  collection: z.string().min(1).max(255).optional(),
});

export const reloadConfigSchema = z.object({
  source: z.enum(["static", "discovery"]),
});

export type QueryDocumentsInput = z.infer<typeof queryDocumentsSchema>;
export type IndexDocumentsInput = z.infer<typeof indexDocumentsSchema>;
export type ReloadConfigInput = z.infer<typeof reloadConfigSchema>;
