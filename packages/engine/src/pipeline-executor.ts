// ──────────────────────────────────────────────
// Strand - Pipeline Executor
// Pure domain logic: no HTTP, no queue client
// ──────────────────────────────────────────────

import type {
  ActivityDescriptor,
  PipelineErrorKind,
  PipelineFailure,
  PipelineResult,
  PipelineRun,
  PipelineStep,
  ResultSummary,
  StepTraceEntry,
} from "@strand/types";
import {
  ActivityExecutionError,
  PipelineTimeoutError,
  TransformError,
  createCorrelationId,
  createPipelineLogger,
  generateId,
  isRecord,
  measureDuration,
  sanitizeErrorMessage,
  startTimer,
  truncateString,
} from "@strand/utils";
import type { ServiceConfig } from "./config/index.js";
import type { ActivityInvoker } from "./invoker/index.js";
import type { TransformRegistry } from "./transforms/index.js";

export interface PipelineExecutorOptions {
  /** Read once per run; later swaps do not affect a run in flight. */
  getConfig: () => ServiceConfig;
  transforms: TransformRegistry;
  invoker: ActivityInvoker;
  defaultCollection: string;
  pipelineTimeoutMs?: number | null;
  now?: () => number;
}

export interface ExecuteOptions {
  runId?: string;
  correlationId?: string;
  pipelineTimeoutMs?: number | null;
  /** Called once every step has resolved, before the first dispatch. */
  onStart?: (run: { runId: string; totalSteps: number }) => void;
  onStepComplete?: (entry: StepTraceEntry) => Promise<void> | void;
}

export interface PipelineExecutor {
  /**
   * Throws ConfigurationError before any activity runs when the pipeline or
   * one of its activities cannot be resolved. Every other failure is returned.
   */
  execute(pipelineName: string, input: unknown, options?: ExecuteOptions): Promise<PipelineResult>;
}

const PREVIEW_LENGTH = 120;
const SUMMARY_KEY_LIMIT = 10;

export function summarizeResult(value: unknown): ResultSummary {
  if (value === null || value === undefined) return { type: "null" };
  if (typeof value === "string") {
    return { type: "string", length: value.length, preview: truncateString(value, PREVIEW_LENGTH) };
  }
  if (typeof value === "number") return { type: "number", preview: String(value) };
  if (typeof value === "boolean") return { type: "boolean", preview: String(value) };
  if (Array.isArray(value)) return { type: "list", length: value.length };
  if (isRecord(value)) return { type: "object", keys: Object.keys(value).slice(0, SUMMARY_KEY_LIMIT) };
  return { type: "string", preview: truncateString(String(value), PREVIEW_LENGTH) };
}

interface StepFailure {
  errorKind: PipelineErrorKind;
  message: string;
  attempts: number;
}

function classifyStepError(err: unknown): StepFailure | null {
  if (err instanceof TransformError) {
    return { errorKind: err.kind, message: err.message, attempts: 0 };
  }
  if (err instanceof ActivityExecutionError) {
    return { errorKind: err.kind, message: err.message, attempts: err.attempts };
  }
  if (err instanceof PipelineTimeoutError) {
    return { errorKind: err.kind, message: err.message, attempts: 0 };
  }
  return null;
}

export function createPipelineExecutor(options: PipelineExecutorOptions): PipelineExecutor {
  const { transforms, invoker, defaultCollection } = options;
  const now = options.now ?? Date.now;

  return {
    async execute(pipelineName, input, executeOptions = {}) {
      const config = options.getConfig();
      const pipeline = config.requirePipeline(pipelineName);

      // Every step resolves before the first dispatch.
      const descriptors: ActivityDescriptor[] = pipeline.steps.map((step) => {
        const descriptor = config.requireActivity(step.activityName);
        invoker.assertInvocable(descriptor);
        return descriptor;
      });

      const runId = executeOptions.runId ?? generateId();
      const correlationId = executeOptions.correlationId ?? createCorrelationId();
      const logger = createPipelineLogger(pipelineName, runId, correlationId);
      const runTimer = startTimer();
      const timeoutMs = executeOptions.pipelineTimeoutMs ?? options.pipelineTimeoutMs ?? null;
      const deadline = timeoutMs !== null && timeoutMs > 0 ? now() + timeoutMs : undefined;

      const run: PipelineRun = {
        pipelineName,
        runId,
        currentStepIndex: 0,
        stepResults: [],
        status: "running",
        finalResult: null,
      };

      logger.info(
        { steps: pipeline.steps.map((step) => step.activityName), configSource: config.source, timeoutMs },
        "Pipeline run started"
      );
      executeOptions.onStart?.({ runId, totalSteps: pipeline.steps.length });

      const notify = async (entry: StepTraceEntry): Promise<void> => {
        if (!executeOptions.onStepComplete) return;
        try {
          await executeOptions.onStepComplete(entry);
        } catch (err) {
          logger.warn(
            { stepIndex: entry.stepIndex, error: sanitizeErrorMessage(err) },
            "Step completion hook failed"
          );
        }
      };

      const fail = (
        stepIndex: number,
        step: PipelineStep,
        failure: StepFailure,
        failedStep: StepTraceEntry | null
      ): PipelineFailure => {
        run.status = "failed";
        const durationMs = measureDuration(runTimer);
        logger.error(
          {
            failedAtStep: stepIndex,
            activityName: step.activityName,
            errorKind: failure.errorKind,
            error: failure.message,
            durationMs,
          },
          "Pipeline run failed"
        );
        return {
          status: "failed",
          pipelineName,
          runId,
          failedAtStep: stepIndex,
          activityName: step.activityName,
          errorKind: failure.errorKind,
          message: failure.message,
          stepsCompleted: run.stepResults.length,
          stepTrace: [...run.stepResults],
          failedStep,
          durationMs,
        };
      };

      let currentData: unknown = input;

      for (let stepIndex = 0; stepIndex < pipeline.steps.length; stepIndex++) {
        const step = pipeline.steps[stepIndex];
        const descriptor = descriptors[stepIndex];
        if (!step || !descriptor) break;

        run.currentStepIndex = stepIndex;

        if (deadline !== undefined && now() >= deadline) {
          return fail(
            stepIndex,
            step,
            {
              errorKind: "PipelineTimeoutError",
              message: `Pipeline "${pipelineName}" exceeded its ${timeoutMs}ms budget before step ${stepIndex}`,
              attempts: 0,
            },
            null
          );
        }

        const stepTimer = startTimer();
        const traceBase = {
          stepIndex,
          activityName: step.activityName,
          transformName: step.transformName,
          executionKind: descriptor.executionKind,
        };

        try {
          const transform = transforms.get(step.transformName);
          let args: unknown[];
          try {
            args = transform(currentData, step, input, defaultCollection);
          } catch (err) {
            throw err instanceof TransformError
              ? err
              : new TransformError(step.transformName, sanitizeErrorMessage(err));
          }

          logger.debug(
            { stepIndex, activityName: step.activityName, executionKind: descriptor.executionKind },
            "Dispatching step"
          );

          const outcome = await invoker.invoke({ descriptor, args, runId, logger, deadline });
          currentData = outcome.result;

          const entry: StepTraceEntry = {
            ...traceBase,
            status: "completed",
            attempts: outcome.attempts,
            durationMs: measureDuration(stepTimer),
            resultSummary: summarizeResult(outcome.result),
            error: null,
          };
          run.stepResults.push(entry);
          logger.info(
            { stepIndex, activityName: step.activityName, attempts: entry.attempts, durationMs: entry.durationMs },
            "Step completed"
          );
          await notify(entry);
        } catch (err) {
          const failure = classifyStepError(err);
          if (!failure) throw err;

          const entry: StepTraceEntry = {
            ...traceBase,
            status: "failed",
            attempts: failure.attempts,
            durationMs: measureDuration(stepTimer),
            resultSummary: null,
            error: failure.message,
          };
          await notify(entry);
          return fail(stepIndex, step, failure, entry);
        }
      }

      run.status = "completed";
      run.finalResult = currentData;
      const durationMs = measureDuration(runTimer);
      logger.info({ stepsCompleted: run.stepResults.length, durationMs }, "Pipeline run completed");

      return {
        status: "completed",
        pipelineName,
        runId,
        finalResult: run.finalResult,
        stepsCompleted: run.stepResults.length,
        stepTrace: [...run.stepResults],
        durationMs,
      };
    },
  };
}
