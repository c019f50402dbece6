// ──────────────────────────────────────────────
// Strand - Structured Logger (Pino)
// ──────────────────────────────────────────────

import pino from "pino";
import type { LoggerOptions } from "pino";
import { randomUUID } from "node:crypto";
import type { ActivityLogger } from "@strand/types";

export type Logger = pino.Logger;

const loggerOptions: LoggerOptions = {
  level: process.env["LOG_LEVEL"] ?? "info",
  base: { service: process.env["SERVICE_NAME"] ?? "strand" },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => ({ level: label }),
  },
  redact: {
    paths: ["apiKey", "password", "authorization", "cookie", "connection.password", "*.password"],
    censor: "[REDACTED]",
  },
};

export const rootLogger: Logger = pino(loggerOptions);

export const createLogger = (module: string, extra: Record<string, unknown> = {}): Logger =>
  rootLogger.child({ module, ...extra });

export const createCorrelationId = (): string => randomUUID();

/** One child per run; every line carries the pipeline, run and correlation ids. */
export const createPipelineLogger = (pipelineName: string, runId: string, correlationId: string): Logger =>
  createLogger("pipeline", { pipelineName, runId, correlationId });

// Activities log through this message-first shape and never import pino.
export function toActivityLogger(logger: Logger, bindings: Record<string, unknown> = {}): ActivityLogger {
  const forward =
    (level: "info" | "warn" | "error" | "debug") =>
    (msg: string, data?: Record<string, unknown>): void => {
      logger[level]({ ...bindings, ...data }, msg);
    };
  return { info: forward("info"), warn: forward("warn"), error: forward("error"), debug: forward("debug") };
}
