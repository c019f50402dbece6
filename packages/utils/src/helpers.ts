// ──────────────────────────────────────────────
// Strand - Utility Helpers
// ──────────────────────────────────────────────

import { randomUUID } from "node:crypto";
import { setTimeout as delay } from "node:timers/promises";

const NANOS_PER_MILLI = 1_000_000n;

/** Largest delay `setTimeout` honours; anything above fires after 1 ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;
const ELLIPSIS = "...";

const REDACTIONS: ReadonlyArray<readonly [pattern: RegExp, replacement: string]> = [
  [/key[=:]\s*["']?[a-zA-Z0-9_-]{20,}["']?/gi, "key=[REDACTED]"],
  [/Bearer\s+[a-zA-Z0-9._-]+/gi, "Bearer [REDACTED]"],
  [/(postgres(?:ql)?:\/\/[^:\s]+:)[^@\s]+@/gi, "$1[REDACTED]@"],
  [/(redis:\/\/[^:\s]*:)[^@\s]+@/gi, "$1[REDACTED]@"],
];

export const generateId = (): string => randomUUID();

export const sleep = (ms: number): Promise<void> => delay(ms);

export function truncateString(str: string, maxLength: number): string {
  return str.length > maxLength ? `${str.slice(0, maxLength - ELLIPSIS.length)}${ELLIPSIS}` : str;
}

export const clampTimerDelay = (ms: number): number => Math.min(Math.max(0, ms), MAX_TIMER_DELAY_MS);

export const startTimer = (): bigint => process.hrtime.bigint();

/** Whole milliseconds elapsed since a {@link startTimer} mark. */
export function measureDuration(startTime: bigint): number {
  return Number((process.hrtime.bigint() - startTime) / NANOS_PER_MILLI);
}

/** Error text safe to log or return to callers: keys, bearer tokens and URL passwords are masked. */
export function sanitizeErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return REDACTIONS.reduce((message, [pattern, replacement]) => message.replace(pattern, replacement), error.message);
  }
  return typeof error === "string" && error !== "" ? error : "An unexpected error occurred";
}

export function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}
