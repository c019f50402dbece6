// ──────────────────────────────────────────────
// Strand - Discovery & Configuration Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import type { DiscoveryService } from "@strand/discovery";
import { reloadConfigSchema } from "../validation/schemas.js";
import type { PipelineService } from "../services/pipeline.service.js";
import { sendData, sendError, sendValidationError } from "./reply.js";

export function registerDiscoveryRoutes(
  app: FastifyInstance,
  pipelineService: PipelineService,
  discovery: DiscoveryService | undefined
): void {
  const notConfigured = (reply: FastifyReply) =>
    sendError(reply, 503, { code: "DISCOVERY_DISABLED", message: "Service discovery is not configured" });

  app.get("/api/discovery/services", async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!discovery) return notConfigured(reply);
    return sendData(reply, await discovery.discoverHybrid());
  });

  app.get("/api/discovery/status", async (_request: FastifyRequest, reply: FastifyReply) => {
    if (!discovery) return notConfigured(reply);
    return sendData(reply, await discovery.getStatus());
  });

  app.post("/api/config/reload", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = reloadConfigSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    return sendData(reply, await pipelineService.reload(parsed.data.source));
  });
}
