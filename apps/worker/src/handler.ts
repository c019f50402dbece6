// ──────────────────────────────────────────────
// Strand - Activity Job Handler
// Pure job processing, no HTTP logic
// ──────────────────────────────────────────────

import { UnrecoverableError } from "bullmq";
import type { Job } from "bullmq";
import type { ActivityDefinition, ActivityJobPayload } from "@strand/types";
import { NON_RETRYABLE_FAILURE_PREFIX } from "@strand/types";
import {
  ActivityTimeoutError,
  NonRetryableActivityError,
  clampTimerDelay,
  createLogger,
  measureDuration,
  sanitizeErrorMessage,
  startTimer,
  toActivityLogger,
} from "@strand/utils";

const logger = createLogger("activity-handler");

export type ActivityJob = Pick<Job<ActivityJobPayload>, "id" | "name" | "data">;

export interface ActivityJobHandlerOptions {
  activities: ActivityDefinition[];
  now?: () => number;
}

/**
 * Runs the activity named by the job. The dispatcher owns retries, so every
 * terminal failure becomes an UnrecoverableError.
 */
export function createActivityJobHandler(options: ActivityJobHandlerOptions) {
  const activities = new Map(options.activities.map((activity) => [activity.name, activity]));
  const now = options.now ?? Date.now;

  return async function handleActivityJob(job: ActivityJob): Promise<unknown> {
    const { args, runId, attempt, deadline } = job.data;
    const jobLogger = logger.child({ jobId: job.id, activityName: job.name, runId, attempt });

    const activity = activities.get(job.name);
    if (!activity) {
      throw new UnrecoverableError(
        `${NON_RETRYABLE_FAILURE_PREFIX}Activity "${job.name}" is not hosted by this worker`
      );
    }

    const remainingMs = deadline - now();
    if (remainingMs <= 0) {
      jobLogger.warn({ lateByMs: -remainingMs }, "Job picked up after its deadline");
      throw new UnrecoverableError(`Activity "${job.name}" picked up after its deadline`);
    }

    const controller = new AbortController();
    const timer = setTimeout(
      () => controller.abort(new ActivityTimeoutError(job.name, remainingMs)),
      clampTimerDelay(remainingMs)
    );
    const started = startTimer();

    try {
      const result = await activity.run(args, {
        activityName: job.name,
        runId,
        attempt,
        signal: controller.signal,
        logger: toActivityLogger(jobLogger),
      });
      jobLogger.info({ durationMs: measureDuration(started) }, "Activity completed");
      return result;
    } catch (err) {
      const message = sanitizeErrorMessage(err);
      jobLogger.error({ error: message, durationMs: measureDuration(started) }, "Activity failed");
      if (err instanceof NonRetryableActivityError) {
        throw new UnrecoverableError(`${NON_RETRYABLE_FAILURE_PREFIX}${message}`);
      }
      throw new UnrecoverableError(message);
    } finally {
      clearTimeout(timer);
    }
  };
}
