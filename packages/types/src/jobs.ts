// ──────────────────────────────────────────────
// Strand - Task Queue Job Payloads
// ──────────────────────────────────────────────

export interface ActivityJobPayload {
  activityName: string;
  args: unknown[];
  runId: string;
  attempt: number;
  /** Epoch millis after which the dispatcher has stopped waiting. */
  deadline: number;
}

/** Marks a failed job whose error must not be retried by the dispatcher. */
export const NON_RETRYABLE_FAILURE_PREFIX = "[non-retryable] ";
