// ──────────────────────────────────────────────
// Strand - Activity Policy Defaults
// ──────────────────────────────────────────────

import type { RetryPolicy } from "@strand/types";

export const DEFAULT_TIMEOUT_MS = 5 * 60_000;
export const DEFAULT_INITIAL_INTERVAL_MS = 1_000;
export const DEFAULT_MAX_INTERVAL_MS = 30_000;
export const DEFAULT_MAX_ATTEMPTS = 3;

export const DEFAULT_RETRY_POLICY: Readonly<RetryPolicy> = Object.freeze({
  initialIntervalMs: DEFAULT_INITIAL_INTERVAL_MS,
  maxIntervalMs: DEFAULT_MAX_INTERVAL_MS,
  maxAttempts: DEFAULT_MAX_ATTEMPTS,
});

export function buildRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const initialIntervalMs = overrides.initialIntervalMs ?? DEFAULT_INITIAL_INTERVAL_MS;
  return {
    initialIntervalMs,
    maxIntervalMs: Math.max(initialIntervalMs, overrides.maxIntervalMs ?? DEFAULT_MAX_INTERVAL_MS),
    maxAttempts: Math.max(1, overrides.maxAttempts ?? DEFAULT_MAX_ATTEMPTS),
  };
}
