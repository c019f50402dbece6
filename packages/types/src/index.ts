// ──────────────────────────────────────────────
// Strand - Shared Types
// ──────────────────────────────────────────────

export * from "./activity.js";
export * from "./pipeline.js";
export * from "./discovery.js";
export * from "./documents.js";
export * from "./jobs.js";
export * from "./api.js";
