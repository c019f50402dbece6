// ──────────────────────────────────────────────
// Strand - Activity Invoker
// Retry and timeout primitive shared by local and remote activities
// ──────────────────────────────────────────────

import type { ActivityDescriptor } from "@strand/types";
import {
  ActivityExecutionError,
  ActivityTimeoutError,
  ConfigurationError,
  clampTimerDelay,
  NonRetryableActivityError,
  PipelineTimeoutError,
  sanitizeErrorMessage,
  sleep as defaultSleep,
  toActivityLogger,
} from "@strand/utils";
import type { Logger } from "@strand/utils";
import { computeBackoffDelay } from "./backoff.js";
import type { LocalActivityRegistry } from "./local-registry.js";

export interface RemoteDispatchRequest {
  activityName: string;
  taskQueue: string;
  args: unknown[];
  runId: string;
  attempt: number;
  timeoutMs: number;
  signal: AbortSignal;
}

/**
 * Sends one attempt to the worker pool polling `taskQueue`. Implementations
 * must not retry; throw NonRetryableActivityError for terminal failures.
 */
export interface RemoteActivityTransport {
  dispatch(request: RemoteDispatchRequest): Promise<unknown>;
}

export interface InvocationRequest {
  descriptor: ActivityDescriptor;
  args: unknown[];
  runId: string;
  logger: Logger;
  /** Epoch millis bounding every attempt and backoff of this invocation. */
  deadline?: number;
}

export interface InvocationOutcome {
  result: unknown;
  attempts: number;
}

export interface ActivityInvoker {
  /** Throws ConfigurationError when the descriptor cannot be dispatched. */
  assertInvocable(descriptor: ActivityDescriptor): void;
  invoke(request: InvocationRequest): Promise<InvocationOutcome>;
}

export interface ActivityInvokerOptions {
  local: LocalActivityRegistry;
  remote?: RemoteActivityTransport;
  sleep?: (ms: number) => Promise<void>;
  now?: () => number;
}

function withTimeout<T>(
  activityName: string,
  timeoutMs: number,
  run: (signal: AbortSignal) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new ActivityTimeoutError(activityName, timeoutMs);
      reject(error);
      controller.abort(error);
    }, clampTimerDelay(timeoutMs));
  });

  return Promise.race([run(controller.signal), timeout]).finally(() => clearTimeout(timer));
}

export function createActivityInvoker(options: ActivityInvokerOptions): ActivityInvoker {
  const { local, remote } = options;
  const sleep = options.sleep ?? defaultSleep;
  const now = options.now ?? Date.now;

  const assertInvocable = (descriptor: ActivityDescriptor): void => {
    if (descriptor.executionKind === "local") {
      if (!local.has(descriptor.name)) {
        throw new ConfigurationError(
          `Local activity "${descriptor.name}" is not registered in this process. Registered: ${local.names().join(", ")}`,
          undefined,
          "ACTIVITY_NOT_FOUND"
        );
      }
      return;
    }
    if (!descriptor.taskQueue) {
      throw new ConfigurationError(`Remote activity "${descriptor.name}" has no task queue`);
    }
    if (!remote) {
      throw new ConfigurationError(
        `Remote activity "${descriptor.name}" cannot be dispatched: no remote transport configured`
      );
    }
  };

  const runAttempt = (
    request: InvocationRequest,
    attempt: number,
    timeoutMs: number
  ): Promise<unknown> => {
    const { descriptor, args, runId, logger } = request;

    return withTimeout(descriptor.name, timeoutMs, async (signal) => {
      if (descriptor.executionKind === "local") {
        const run = local.get(descriptor.name);
        if (!run) {
          throw new ConfigurationError(`Local activity "${descriptor.name}" is not registered`);
        }
        return run(args, {
          activityName: descriptor.name,
          runId,
          attempt,
          signal,
          logger: toActivityLogger(logger, { activityName: descriptor.name, attempt }),
        });
      }

      if (!remote || !descriptor.taskQueue) {
        throw new ConfigurationError(`Remote activity "${descriptor.name}" cannot be dispatched`);
      }
      return remote.dispatch({
        activityName: descriptor.name,
        taskQueue: descriptor.taskQueue,
        args,
        runId,
        attempt,
        timeoutMs,
        signal,
      });
    });
  };

  const remaining = (deadline: number | undefined): number =>
    deadline === undefined ? Number.POSITIVE_INFINITY : deadline - now();

  return {
    assertInvocable,

    async invoke(request) {
      const { descriptor, logger, deadline } = request;
      const { maxAttempts } = descriptor.retryPolicy;
      let lastError: unknown = null;
      let timedOut = false;
      let attempt = 0;

      while (attempt < maxAttempts) {
        const budget = remaining(deadline);
        if (budget <= 0) {
          throw new PipelineTimeoutError(
            `Pipeline deadline reached before attempt ${attempt + 1} of "${descriptor.name}"`
          );
        }

        attempt++;
        const timeoutMs = Math.min(descriptor.timeoutMs, budget);

        try {
          const result = await runAttempt(request, attempt, timeoutMs);
          if (attempt > 1) {
            logger.info({ activityName: descriptor.name, attempt }, "Activity succeeded after retry");
          }
          return { result, attempts: attempt };
        } catch (err) {
          if (err instanceof ConfigurationError) throw err;

          lastError = err;
          timedOut = err instanceof ActivityTimeoutError;

          if (err instanceof NonRetryableActivityError || attempt >= maxAttempts) {
            break;
          }

          const delay = Math.min(
            computeBackoffDelay(descriptor.retryPolicy, attempt),
            Math.max(0, remaining(deadline))
          );
          logger.warn(
            {
              activityName: descriptor.name,
              attempt,
              maxAttempts,
              nextDelayMs: delay,
              error: sanitizeErrorMessage(err),
            },
            "Activity attempt failed, retrying"
          );
          await sleep(delay);
        }
      }

      const message = sanitizeErrorMessage(lastError);
      logger.error(
        { activityName: descriptor.name, attempts: attempt, timedOut, error: message },
        "Activity failed"
      );
      throw new ActivityExecutionError(
        descriptor.name,
        attempt,
        timedOut,
        `Activity "${descriptor.name}" failed after ${attempt} attempt(s): ${message}`,
        { cause: lastError }
      );
    },
  };
}
