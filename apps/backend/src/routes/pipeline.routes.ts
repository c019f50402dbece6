// ──────────────────────────────────────────────
// Strand - Pipeline Routes
// ──────────────────────────────────────────────

import type { FastifyInstance, FastifyRequest, FastifyReply } from "fastify";
import {
  executePipelineSchema,
  indexDocumentsSchema,
  pipelineParamsSchema,
  queryDocumentsSchema,
  runParamsSchema,
} from "../validation/schemas.js";
import type { PipelineService } from "../services/pipeline.service.js";
import { sendData, sendError, sendPipelineResult, sendRunExists, sendValidationError } from "./reply.js";

export function registerPipelineRoutes(app: FastifyInstance, pipelineService: PipelineService): void {
  app.get("/api/pipelines", async (_request: FastifyRequest, reply: FastifyReply) => {
    return sendData(reply, pipelineService.listPipelines());
  });

  const parseRunRequest = (request: FastifyRequest, reply: FastifyReply) => {
    const params = pipelineParamsSchema.safeParse(request.params);
    if (!params.success) {
      sendValidationError(reply, params.error, "Invalid pipeline name");
      return null;
    }
    const body = executePipelineSchema.safeParse(request.body ?? {});
    if (!body.success) {
      sendValidationError(reply, body.error);
      return null;
    }
    const { runId } = body.data;
    if (runId !== undefined && pipelineService.hasRun(runId)) {
      sendRunExists(reply, runId);
      return null;
    }
    return { pipelineName: params.data.pipelineName, input: body.data.input ?? null, runId };
  };

  // Runs inside the request; answers with the result
  app.post("/api/pipelines/:pipelineName/execute", async (request: FastifyRequest, reply: FastifyReply) => {
    const run = parseRunRequest(request, reply);
    if (!run) return reply;
    return sendPipelineResult(reply, await pipelineService.execute(run.pipelineName, run.input, run.runId));
  });

  // Answers once the run is underway; poll GET /api/runs/:runId
  app.post("/api/pipelines/:pipelineName/runs", async (request: FastifyRequest, reply: FastifyReply) => {
    const run = parseRunRequest(request, reply);
    if (!run) return reply;
    return sendData(reply, await pipelineService.start(run.pipelineName, run.input, run.runId), 202);
  });

  app.get("/api/runs/:runId", async (request: FastifyRequest, reply: FastifyReply) => {
    const params = runParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, params.error, "Invalid run id");
    }
    const run = pipelineService.getRun(params.data.runId);
    if (!run) {
      return sendError(reply, 404, { code: "RUN_NOT_FOUND", message: `Run "${params.data.runId}" not found` });
    }
    return sendData(reply, run);
  });

  app.post("/api/query", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = queryDocumentsSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    return sendPipelineResult(reply, await pipelineService.query(parsed.data));
  });

  app.post("/api/documents", async (request: FastifyRequest, reply: FastifyReply) => {
    const parsed = indexDocumentsSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, parsed.error);
    }
    return sendPipelineResult(reply, await pipelineService.indexDocuments(parsed.data));
  });
}
