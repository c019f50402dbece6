// ──────────────────────────────────────────────
// Strand - Passthrough Transform
// ──────────────────────────────────────────────

import type { TransformDefinition } from "./types.js";

export const PASSTHROUGH_TRANSFORM = "passthrough";

export const passthroughTransform: TransformDefinition = {
  name: PASSTHROUGH_TRANSFORM,
  description: "Wraps a non-list value in a one-element list; lists pass unchanged",
  apply: (data) => (Array.isArray(data) ? data : [data]),
};
