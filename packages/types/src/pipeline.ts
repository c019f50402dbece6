// ──────────────────────────────────────────────
// Strand - Pipeline Types
// ──────────────────────────────────────────────

import type { ExecutionKind } from "./activity.js";

export type PipelineOrigin = "declared" | "inferred";

export interface PipelineStep {
  activityName: string;
  transformName: string;
  /** Kind written in the configuration document, checked against the descriptor at load. */
  declaredKind?: ExecutionKind;
  serviceName?: string;
}

export interface PipelineDefinition {
  name: string;
  displayName: string;
  description?: string;
  origin: PipelineOrigin;
  steps: readonly PipelineStep[];
}

export type PipelineRunStatus = "running" | "completed" | "failed";
export type StepTraceStatus = "completed" | "failed";

export type PipelineErrorKind =
  | "ConfigurationError"
  | "TransformError"
  | "ActivityExecutionError"
  | "PipelineTimeoutError"
  | "DiscoveryError";

export interface ResultSummary {
  type: "null" | "string" | "number" | "boolean" | "list" | "object";
  length?: number;
  keys?: string[];
  preview?: string;
}

export interface StepTraceEntry {
  stepIndex: number;
  activityName: string;
  transformName: string;
  executionKind: ExecutionKind;
  status: StepTraceStatus;
  attempts: number;
  durationMs: number;
  resultSummary: ResultSummary | null;
  error: string | null;
}

export interface PipelineSuccess {
  status: "completed";
  pipelineName: string;
  runId: string;
  finalResult: unknown;
  stepsCompleted: number;
  stepTrace: StepTraceEntry[];
  durationMs: number;
}

export interface PipelineFailure {
  status: "failed";
  pipelineName: string;
  runId: string;
  failedAtStep: number;
  activityName: string;
  errorKind: PipelineErrorKind;
  message: string;
  stepsCompleted: number;
  /** Steps that completed before the failure. */
  stepTrace: StepTraceEntry[];
  /** Trace entry of the failing step; null when the run failed before dispatching it. */
  failedStep: StepTraceEntry | null;
  durationMs: number;
}

export type PipelineResult = PipelineSuccess | PipelineFailure;

export interface PipelineRun {
  pipelineName: string;
  runId: string;
  currentStepIndex: number;
  stepResults: StepTraceEntry[];
  status: PipelineRunStatus;
  finalResult: unknown;
}
