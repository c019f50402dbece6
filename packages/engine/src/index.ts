// ──────────────────────────────────────────────
// Strand - Engine Package
// ──────────────────────────────────────────────

export * from "./transforms/index.js";
export * from "./config/index.js";
export * from "./invoker/index.js";
export { createPipelineExecutor, summarizeResult } from "./pipeline-executor.js";
export type { PipelineExecutor, PipelineExecutorOptions, ExecuteOptions } from "./pipeline-executor.js";
