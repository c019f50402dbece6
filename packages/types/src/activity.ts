// ──────────────────────────────────────────────
// Strand - Activity Types
// ──────────────────────────────────────────────

export type ExecutionKind = "local" | "remote";

export interface RetryPolicy {
  initialIntervalMs: number;
  maxIntervalMs: number;
  maxAttempts: number;
}

export interface ActivityDescriptor {
  name: string;
  executionKind: ExecutionKind;
  /** Queue polled by the owning worker pool; null for local activities. */
  taskQueue: string | null;
  serviceName: string;
  timeoutMs: number;
  retryPolicy: RetryPolicy;
  description?: string;
}

export interface ActivityLogger {
  info: (message: string, data?: Record<string, unknown>) => void;
  warn: (message: string, data?: Record<string, unknown>) => void;
  error: (message: string, data?: Record<string, unknown>) => void;
  debug: (message: string, data?: Record<string, unknown>) => void;
}

export interface ActivityContext {
  activityName: string;
  runId: string;
  attempt: number;
  signal: AbortSignal;
  logger: ActivityLogger;
}

export type ActivityFunction = (args: unknown[], context: ActivityContext) => Promise<unknown>;

export interface ActivityParameter {
  name: string;
  type: string;
  description: string;
  required: boolean;
}

export interface ActivityReturns {
  type: string;
  description: string;
}

export interface ActivityDefinition {
  name: string;
  description: string;
  timeoutSeconds: number;
  retryAttempts: number;
  parameters: ActivityParameter[];
  returns: ActivityReturns;
  run: ActivityFunction;
}
