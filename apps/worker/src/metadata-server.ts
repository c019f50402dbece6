// ──────────────────────────────────────────────
// Strand - Worker Metadata Server
// Publishes hosted activities for discovery
// ──────────────────────────────────────────────

import Fastify from "fastify";
import type { FastifyInstance } from "fastify";
import type { ActivityDefinition, VectorStore, WorkerHealth, WorkerMetadataDocument } from "@strand/types";

export interface MetadataServerOptions {
  serviceName: string;
  taskQueue: string;
  workerIdentity: string;
  version: string;
  activities: ActivityDefinition[];
  vectorStore: VectorStore;
}

export function buildMetadataServer(options: MetadataServerOptions): FastifyInstance {
  const app = Fastify({ logger: false });

  const currentHealth = async (): Promise<WorkerHealth> =>
    (await options.vectorStore.ping()) ? "healthy" : "degraded";

  app.get("/metadata", async (): Promise<WorkerMetadataDocument> => ({
    service_name: options.serviceName,
    task_queue: options.taskQueue,
    worker_identity: options.workerIdentity,
    health: await currentHealth(),
    version: options.version,
    activities: options.activities.map((activity) => ({
      name: activity.name,
      description: activity.description,
      timeout_seconds: activity.timeoutSeconds,
      retry_attempts: activity.retryAttempts,
      parameters: activity.parameters,
      returns: activity.returns,
    })),
  }));

  app.get("/health", async () => ({ status: await currentHealth() }));

  return app;
}
