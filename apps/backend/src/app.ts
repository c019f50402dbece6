// ──────────────────────────────────────────────
// Strand - Backend API Application
// ──────────────────────────────────────────────

import Fastify, { type FastifyInstance, type FastifyRequest, type FastifyReply } from "fastify";
import cors from "@fastify/cors";
import rateLimit from "@fastify/rate-limit";
import type { DiscoveryService } from "@strand/discovery";
import { ConfigurationError, DiscoveryError, createLogger } from "@strand/utils";
import type { PipelineService } from "./services/pipeline.service.js";
import { registerPipelineRoutes } from "./routes/pipeline.routes.js";
import { registerDiscoveryRoutes } from "./routes/discovery.routes.js";
import { sendError } from "./routes/reply.js";

const logger = createLogger("server");

export interface AppDependencies {
  pipelineService: PipelineService;
  discovery?: DiscoveryService;
  rateLimit: { max: number; windowMs: number };
  /** Fastify request logging level; false disables it. */
  logLevel: string | false;
  nodeEnv: string;
}

export async function buildApp(deps: AppDependencies): Promise<FastifyInstance> {
  const app = Fastify({
    logger: deps.logLevel === false ? false : { level: deps.logLevel, timestamp: true },
  });

  // Plugins
  await app.register(cors, {
    origin: true,
    credentials: true,
  });

  await app.register(rateLimit, {
    max: deps.rateLimit.max,
    timeWindow: deps.rateLimit.windowMs,
  });

  // Routes
  registerPipelineRoutes(app, deps.pipelineService);
  registerDiscoveryRoutes(app, deps.pipelineService, deps.discovery);

  // Health check
  app.get("/api/health", async () => {
    return { status: "ok", timestamp: new Date().toISOString() };
  });

  // Global error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, _request: FastifyRequest, reply: FastifyReply) => {
    if (error instanceof ConfigurationError) {
      const notFound = error.code === "PIPELINE_NOT_FOUND";
      logger.warn({ code: error.code, message: error.message }, "Configuration error");
      return sendError(reply, notFound ? 404 : 400, {
        code: notFound ? "PIPELINE_NOT_FOUND" : "CONFIGURATION_ERROR",
        message: error.message,
        details: error.problems,
      });
    }

    if (error instanceof DiscoveryError) {
      logger.warn({ message: error.message }, "Discovery unavailable");
      return sendError(reply, 503, { code: "DISCOVERY_UNAVAILABLE", message: error.message });
    }

    logger.error(
      {
        message: error.message,
        statusCode: error.statusCode,
        stack: deps.nodeEnv === "development" ? error.stack : undefined,
      },
      "Unhandled error"
    );

    const statusCode = error.statusCode ?? 500;
    return sendError(reply, statusCode, {
      code: statusCode === 429 ? "RATE_LIMITED" : "INTERNAL_ERROR",
      message: statusCode === 500 ? "Internal server error" : error.message,
    });
  });

  return app;
}
