// ──────────────────────────────────────────────
// Strand - Transform Contracts
// ──────────────────────────────────────────────

import type { PipelineStep } from "@strand/types";

/**
 * Turns the previous step's output into the positional argument list the
 * next activity takes. `originalInput` is the value the run started with.
 */
export type TransformFn = (
  data: unknown,
  step: PipelineStep,
  originalInput: unknown,
  defaultCollection: string
) => unknown[];

export interface TransformDefinition {
  name: string;
  description: string;
  apply: TransformFn;
}
