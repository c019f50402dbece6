// ──────────────────────────────────────────────
// Strand - Retry Backoff
// ──────────────────────────────────────────────

import type { RetryPolicy } from "@strand/types";

/** Delay before retry number `failedAttempt + 1`. */
export function computeBackoffDelay(policy: RetryPolicy, failedAttempt: number): number {
  const exponential = policy.initialIntervalMs * Math.pow(2, Math.max(0, failedAttempt - 1));
  return Math.min(exponential, policy.maxIntervalMs);
}
