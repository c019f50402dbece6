// ──────────────────────────────────────────────
// Strand - Activity Worker Process
// BullMQ consumer plus the discovery metadata endpoint
// ──────────────────────────────────────────────

import { hostname } from "node:os";
import { Worker } from "bullmq";
import type { ActivityJobPayload, VectorStore } from "@strand/types";
import { closeConnection, ensureVectorPointsTable, getDatabase } from "@strand/database";
import {
  createActivityCatalog,
  createHashEmbedder,
  createInMemoryVectorStore,
  createPostgresVectorStore,
  selectActivities,
} from "@strand/activities";
import { createLogger, loadConfig } from "@strand/utils";
import type { AppConfig } from "@strand/utils";
import { createActivityJobHandler } from "./handler.js";
import { buildMetadataServer } from "./metadata-server.js";

const logger = createLogger("worker");

async function createVectorStore(config: AppConfig): Promise<VectorStore> {
  if (config.worker.vectorStore === "memory") {
    return createInMemoryVectorStore();
  }
  if (!config.databaseUrl) {
    throw new Error("VECTOR_STORE=postgres requires DATABASE_URL");
  }
  const db = getDatabase(config.databaseUrl);
  await ensureVectorPointsTable(db);
  return createPostgresVectorStore(db, { embeddingModel: createHashEmbedder().model });
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const { serviceName, taskQueue, concurrency } = config.worker;
  const workerIdentity = `${serviceName}@${hostname()}:${process.pid}`;

  const vectorStore = await createVectorStore(config);
  const activities = selectActivities(createActivityCatalog({ vectorStore }), config.worker.activities);

  logger.info(
    {
      serviceName,
      taskQueue,
      concurrency,
      activities: activities.map((activity) => activity.name),
      vectorStore: config.worker.vectorStore,
    },
    "Starting Strand activity worker"
  );

  const handleActivityJob = createActivityJobHandler({ activities });

  const worker = new Worker<ActivityJobPayload>(taskQueue, handleActivityJob, {
    name: workerIdentity,
    connection: {
      host: config.redis.host,
      port: config.redis.port,
    },
    concurrency,
    removeOnComplete: { count: 1000 },
    removeOnFail: { count: 5000 },
  });

  worker.on("completed", (job) => {
    logger.info({ jobId: job.id, activityName: job.name, runId: job.data.runId }, "Job completed");
  });

  worker.on("failed", (job, err) => {
    logger.error(
      { jobId: job?.id, activityName: job?.name, runId: job?.data.runId, error: err.message },
      "Job failed"
    );
  });

  worker.on("error", (err) => {
    logger.error({ error: err.message }, "Worker error");
  });

  const metadataServer = buildMetadataServer({
    serviceName,
    taskQueue,
    workerIdentity,
    version: config.worker.version,
    activities,
    vectorStore,
  });
  await metadataServer.listen({ host: config.worker.metadataHost, port: config.worker.metadataPort });

  logger.info(
    { metadataHost: config.worker.metadataHost, metadataPort: config.worker.metadataPort },
    "Strand activity worker started successfully"
  );

  // Shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await worker.close();
    await metadataServer.close();
    await closeConnection();
    logger.info("Worker shut down");
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ error: err, signal }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
}

bootstrap().catch((err) => {
  logger.error({ error: err }, "Worker bootstrap failed");
  process.exit(1);
});
