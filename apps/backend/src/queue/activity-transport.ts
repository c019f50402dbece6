// ──────────────────────────────────────────────
// Strand - BullMQ Activity Transport
// One job per attempt on the activity's task queue
// ──────────────────────────────────────────────

import { Queue, QueueEvents } from "bullmq";
import type { ActivityJobPayload } from "@strand/types";
import { NON_RETRYABLE_FAILURE_PREFIX } from "@strand/types";
import type { RemoteActivityTransport } from "@strand/engine";
import { NonRetryableActivityError, createLogger, sanitizeErrorMessage } from "@strand/utils";

const logger = createLogger("activity-transport");

export interface BullMQActivityTransportOptions {
  connection: {
    host: string;
    port: number;
  };
  now?: () => number;
}

export interface BullMQActivityTransport extends RemoteActivityTransport {
  close(): Promise<void>;
}

interface TaskQueueChannel {
  queue: Queue<ActivityJobPayload>;
  events: QueueEvents;
  ready: Promise<void>;
}

/** Failed jobs carry only their reason; the marker survives the round trip. */
export function toDispatchError(err: unknown): Error {
  const message = sanitizeErrorMessage(err);
  if (message.startsWith(NON_RETRYABLE_FAILURE_PREFIX)) {
    return new NonRetryableActivityError(message.slice(NON_RETRYABLE_FAILURE_PREFIX.length), { cause: err });
  }
  return err instanceof Error ? err : new Error(message);
}

export function createBullMQActivityTransport(options: BullMQActivityTransportOptions): BullMQActivityTransport {
  const channels = new Map<string, TaskQueueChannel>();
  const now = options.now ?? Date.now;

  const getChannel = (taskQueue: string): TaskQueueChannel => {
    const existing = channels.get(taskQueue);
    if (existing) return existing;

    const queue = new Queue<ActivityJobPayload>(taskQueue, {
      connection: options.connection,
      defaultJobOptions: {
        removeOnComplete: { count: 1000 },
        removeOnFail: { count: 5000 },
        attempts: 1,
      },
    });
    const events = new QueueEvents(taskQueue, { connection: options.connection });
    const channel = { queue, events, ready: events.waitUntilReady().then(() => undefined) };
    channels.set(taskQueue, channel);

    logger.info({ taskQueue }, "BullMQ task queue channel opened");
    return channel;
  };

  return {
    async dispatch(request) {
      request.signal.throwIfAborted();
      const channel = getChannel(request.taskQueue);
      await channel.ready;

      const payload: ActivityJobPayload = {
        activityName: request.activityName,
        args: request.args,
        runId: request.runId,
        attempt: request.attempt,
        deadline: now() + request.timeoutMs,
      };
      const job = await channel.queue.add(request.activityName, payload);

      logger.debug(
        { jobId: job.id, taskQueue: request.taskQueue, activityName: request.activityName, attempt: request.attempt },
        "Activity job enqueued"
      );

      try {
        return await job.waitUntilFinished(channel.events, request.timeoutMs);
      } catch (err) {
        throw toDispatchError(err);
      }
    },

    async close() {
      const open = Array.from(channels.values());
      channels.clear();
      await Promise.all(open.flatMap((channel) => [channel.queue.close(), channel.events.close()]));
    },
  };
}
