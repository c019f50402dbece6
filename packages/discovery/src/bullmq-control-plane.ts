// ──────────────────────────────────────────────
// Strand - BullMQ Control Plane
// Task queue = BullMQ queue; poller = connected BullMQ worker
// ──────────────────────────────────────────────

import { Queue } from "bullmq";
import type { TaskQueueDescription } from "@strand/types";
import { createLogger } from "@strand/utils";
import type { ControlPlane } from "./control-plane.js";

const logger = createLogger("bullmq-control-plane");

export const CONTROL_QUEUE = "strand-control-plane";

/** The slice of a BullMQ queue the control plane reads. */
export interface QueueHandle {
  ping(): Promise<string>;
  getWorkers(): Promise<Array<Record<string, string>>>;
  close(): Promise<void>;
}

/** Opens a queue handle; with `shared`, the handle reuses that handle's connection. */
export type QueueOpener = (name: string, shared: QueueHandle | null) => Promise<QueueHandle>;

export interface BullMQControlPlaneOptions {
  connection: {
    host: string;
    port: number;
  };
  openQueue?: QueueOpener;
}

function bullmqQueueOpener(connection: BullMQControlPlaneOptions["connection"]): QueueOpener {
  const queues = new WeakMap<QueueHandle, Queue>();

  return async (name, shared) => {
    const owner = shared ? queues.get(shared) : undefined;
    // A Queue built on an existing client leaves it open on close.
    const queue = new Queue(name, { connection: owner ? await owner.client : connection });
    const handle: QueueHandle = {
      ping: async () => (await queue.client).ping(),
      getWorkers: () => queue.getWorkers(),
      close: () => queue.close(),
    };
    queues.set(handle, queue);
    return handle;
  };
}

/**
 * One Redis connection, opened on first use. Each describe borrows it for a
 * short-lived queue handle, so describing many candidate names opens nothing new.
 */
export function createBullMQControlPlane(options: BullMQControlPlaneOptions): ControlPlane {
  const openQueue = options.openQueue ?? bullmqQueueOpener(options.connection);
  let control: Promise<QueueHandle> | null = null;

  const controlQueue = (): Promise<QueueHandle> => {
    control ??= openQueue(CONTROL_QUEUE, null);
    return control;
  };

  return {
    async checkConnection() {
      const reply = await (await controlQueue()).ping();
      if (reply !== "PONG") {
        throw new Error(`Unexpected PING reply from Redis: ${reply}`);
      }
    },

    async describeTaskQueue(name) {
      const queue = await openQueue(name, await controlQueue());
      try {
        const workers = await queue.getWorkers();
        const description: TaskQueueDescription = {
          name,
          pollers: workers.map((worker) => ({
            identity: worker["name"] || worker["id"] || "unknown",
            address: worker["addr"] ?? null,
          })),
        };
        logger.debug({ taskQueue: name, pollers: description.pollers.length }, "Task queue described");
        return description;
      } finally {
        await queue.close();
      }
    },

    async close() {
      const open = control;
      control = null;
      if (open) await (await open).close();
    },
  };
}
