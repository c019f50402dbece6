// ──────────────────────────────────────────────
// Strand - Error Taxonomy
// ──────────────────────────────────────────────

import type { PipelineErrorKind } from "@strand/types";

export abstract class PipelineError extends Error {
  abstract readonly kind: PipelineErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type ConfigurationErrorCode =
  | "PIPELINE_NOT_FOUND"
  | "ACTIVITY_NOT_FOUND"
  | "INVALID_CONFIGURATION";

/**
 * Unknown pipeline, activity or transform, or an invalid configuration
 * document. Never retried.
 */
export class ConfigurationError extends PipelineError {
  readonly kind = "ConfigurationError" as const;

  constructor(
    message: string,
    readonly problems: string[] = [message],
    readonly code: ConfigurationErrorCode = "INVALID_CONFIGURATION"
  ) {
    super(message);
  }
}

export class TransformError extends PipelineError {
  readonly kind = "TransformError" as const;

  constructor(
    readonly transformName: string,
    message: string
  ) {
    super(`Transform "${transformName}" failed: ${message}`);
  }
}

export class ActivityExecutionError extends PipelineError {
  readonly kind = "ActivityExecutionError" as const;

  constructor(
    readonly activityName: string,
    readonly attempts: number,
    readonly timedOut: boolean,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

export class PipelineTimeoutError extends PipelineError {
  readonly kind = "PipelineTimeoutError" as const;
}

export class DiscoveryError extends PipelineError {
  readonly kind = "DiscoveryError" as const;
}

/** A single attempt that ran past its deadline; retryable. */
export class ActivityTimeoutError extends Error {
  constructor(
    readonly activityName: string,
    readonly timeoutMs: number
  ) {
    super(`Activity "${activityName}" timed out after ${timeoutMs}ms`);
    this.name = "ActivityTimeoutError";
  }
}

/** Thrown by an activity to stop the retry loop on the first failure. */
export class NonRetryableActivityError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NonRetryableActivityError";
  }
}
