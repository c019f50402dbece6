// ──────────────────────────────────────────────
// Strand - Backend API Server
// Orchestrator: pipelines run here, remote steps go to worker queues
// ──────────────────────────────────────────────

import type { VectorStore } from "@strand/types";
import { closeConnection, ensureVectorPointsTable, getDatabase } from "@strand/database";
import {
  createActivityInvoker,
  createLocalActivityRegistry,
  createPipelineExecutor,
  createServiceConfigStore,
  createTransformRegistry,
  loadServiceConfig,
} from "@strand/engine";
import type { ServiceConfigSource } from "@strand/engine";
import {
  createBullMQControlPlane,
  createDiscoveryService,
  createMetadataClient,
} from "@strand/discovery";
import {
  createActivityCatalog,
  createHashEmbedder,
  createInMemoryVectorStore,
  createPostgresVectorStore,
} from "@strand/activities";
import { createLogger, loadConfig } from "@strand/utils";
import type { AppConfig } from "@strand/utils";
import { buildApp } from "./app.js";
import { createBullMQActivityTransport } from "./queue/activity-transport.js";
import { createPipelineService } from "./services/pipeline.service.js";

const logger = createLogger("server");

async function createVectorStore(config: AppConfig): Promise<VectorStore> {
  if (config.worker.vectorStore === "memory" || !config.databaseUrl) {
    return createInMemoryVectorStore();
  }
  const db = getDatabase(config.databaseUrl);
  await ensureVectorPointsTable(db);
  return createPostgresVectorStore(db, { embeddingModel: createHashEmbedder().model });
}

async function bootstrap(): Promise<void> {
  const config = loadConfig();
  const connection = { host: config.redis.host, port: config.redis.port };

  const transforms = createTransformRegistry();
  const vectorStore = await createVectorStore(config);
  const transport = createBullMQActivityTransport({ connection });
  const controlPlane = createBullMQControlPlane({ connection });

  const discovery =
    config.discovery.endpoints.length > 0
      ? createDiscoveryService({
          controlPlane,
          metadataClient: createMetadataClient({ timeoutMs: config.discovery.metadataTimeoutMs }),
          endpoints: config.discovery.endpoints,
          serviceNames: config.discovery.serviceNames,
          cacheTtlMs: config.discovery.cacheTtlMs,
          controlPlaneTimeoutMs: config.discovery.controlPlaneTimeoutMs,
        })
      : undefined;

  // Static config first; a discovery source layers the catalog over it.
  const staticConfig = await loadServiceConfig({ kind: "file", path: config.pipeline.configPath }, { transforms });
  let initialSource: ServiceConfigSource | null = null;
  if (config.pipeline.source === "discovery") {
    if (!discovery) {
      throw new Error("PIPELINE_CONFIG_SOURCE=discovery requires DISCOVERY_ENDPOINTS");
    }
    initialSource = { kind: "discovery", provider: discovery, base: staticConfig };
  }
  const initialConfig = initialSource ? await loadServiceConfig(initialSource, { transforms }) : staticConfig;
  const store = createServiceConfigStore(initialConfig, { transforms });

  const executor = createPipelineExecutor({
    getConfig: () => store.current(),
    transforms,
    invoker: createActivityInvoker({
      local: createLocalActivityRegistry(createActivityCatalog({ vectorStore })),
      remote: transport,
    }),
    defaultCollection: config.pipeline.defaultCollection,
    pipelineTimeoutMs: config.pipeline.timeoutMs,
  });

  const pipelineService = createPipelineService({
    executor,
    store,
    configPath: config.pipeline.configPath,
    staticBase: staticConfig,
    discovery,
  });

  const app = await buildApp({
    pipelineService,
    discovery,
    rateLimit: config.rateLimit,
    logLevel: config.logLevel,
    nodeEnv: config.nodeEnv,
  });

  // Start server
  try {
    await app.listen({ port: config.backend.port, host: config.backend.host });
    logger.info(
      {
        port: config.backend.port,
        environment: config.nodeEnv,
        configSource: initialConfig.source,
        pipelines: initialConfig.listPipelines().map((pipeline) => pipeline.name),
      },
      "Strand Backend API started"
    );
  } catch (err) {
    logger.error({ error: err }, "Failed to start server");
    process.exit(1);
  }

  // Shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Shutdown signal received");
    await app.close();
    await pipelineService.drain();
    await transport.close();
    await controlPlane.close();
    await closeConnection();
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
  logger.error({ error: err }, "Bootstrap failed");
  process.exit(1);
});
