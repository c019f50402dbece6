// ──────────────────────────────────────────────
// Strand - Run Registry
// Bounded in-process record of recent pipeline runs
// ──────────────────────────────────────────────

import type { PipelineResult, PipelineRunStatus, StepTraceEntry } from "@strand/types";

export const DEFAULT_RUN_HISTORY_LIMIT = 500;

export interface RunRecord {
  runId: string;
  pipelineName: string;
  status: PipelineRunStatus;
  totalSteps: number;
  stepsCompleted: number;
  stepTrace: StepTraceEntry[];
  startedAt: string;
  finishedAt: string | null;
  result: PipelineResult | null;
  error: string | null;
}

export interface RunRegistry {
  begin(run: { runId: string; pipelineName: string; totalSteps: number }): RunRecord;
  recordStep(runId: string, entry: StepTraceEntry): void;
  finish(result: PipelineResult): void;
  /** The run ended without a result, e.g. an unexpected executor error. */
  abort(runId: string, message: string): void;
  get(runId: string): RunRecord | undefined;
  has(runId: string): boolean;
  size(): number;
}

export interface RunRegistryOptions {
  /** Finished runs are evicted oldest first once the registry holds more. */
  limit?: number;
  now?: () => number;
}

export function createRunRegistry(options: RunRegistryOptions = {}): RunRegistry {
  const limit = options.limit ?? DEFAULT_RUN_HISTORY_LIMIT;
  const now = options.now ?? Date.now;
  const runs = new Map<string, RunRecord>();

  const timestamp = (): string => new Date(now()).toISOString();

  const pickVictim = (): string | undefined => {
    let oldest: string | undefined;
    for (const [runId, record] of runs) {
      if (record.status !== "running") return runId;
      oldest ??= runId;
    }
    return oldest;
  };

  const evict = (): void => {
    while (runs.size > limit) {
      const victim = pickVictim();
      if (victim === undefined) return;
      runs.delete(victim);
    }
  };

  return {
    begin({ runId, pipelineName, totalSteps }) {
      const record: RunRecord = {
        runId,
        pipelineName,
        status: "running",
        totalSteps,
        stepsCompleted: 0,
        stepTrace: [],
        startedAt: timestamp(),
        finishedAt: null,
        result: null,
        error: null,
      };
      runs.delete(runId);
      runs.set(runId, record);
      evict();
      return record;
    },

    recordStep(runId, entry) {
      const record = runs.get(runId);
      if (!record) return;
      record.stepTrace.push(entry);
      if (entry.status === "completed") record.stepsCompleted++;
    },

    finish(result) {
      const record = runs.get(result.runId);
      if (!record) return;
      record.status = result.status;
      record.stepsCompleted = result.stepsCompleted;
      record.stepTrace =
        result.status === "failed" && result.failedStep ? [...result.stepTrace, result.failedStep] : result.stepTrace;
      record.finishedAt = timestamp();
      record.result = result;
      record.error = result.status === "failed" ? result.message : null;
    },

    abort(runId, message) {
      const record = runs.get(runId);
      if (!record) return;
      record.status = "failed";
      record.finishedAt = timestamp();
      record.error = message;
    },

    get: (runId) => runs.get(runId),
    has: (runId) => runs.has(runId),
    size: () => runs.size,
  };
}
