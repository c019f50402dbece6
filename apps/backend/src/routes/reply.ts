import type { FastifyReply } from "fastify";
import type { ApiErrorResponse, ApiResponse, PipelineResult } from "@strand/types";
import type { ZodError } from "zod";

export function sendData<T>(reply: FastifyReply, data: T, statusCode = 200) {
  const body: ApiResponse<T> = { success: true, data };
  return reply.status(statusCode).send(body);
}

export function sendError(reply: FastifyReply, statusCode: number, error: ApiErrorResponse["error"]) {
  const body: ApiErrorResponse = { success: false, error };
  return reply.status(statusCode).send(body);
}

export function sendValidationError(reply: FastifyReply, error: ZodError, message = "Invalid input") {
  return sendError(reply, 400, { code: "VALIDATION_ERROR", message, details: error.flatten() });
}

/** A failed run is a well-formed answer, not a server error. */
export function sendPipelineResult(reply: FastifyReply, result: PipelineResult) {
  if (result.status === "completed") {
    return sendData(reply, result);
  }
  return sendError(reply, 422, { code: "PIPELINE_FAILED", message: result.message, details: result });
}

export function sendRunExists(reply: FastifyReply, runId: string) {
  return sendError(reply, 409, { code: "RUN_EXISTS", message: `Run "${runId}" already exists` });
}
