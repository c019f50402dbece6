// ──────────────────────────────────────────────
// Strand - Worker Metadata Client
// GET {endpoint}/metadata → DiscoveredService
// ──────────────────────────────────────────────

import { z } from "zod";
import type { DiscoveredService, WorkerEndpoint } from "@strand/types";
import { MAX_TIMER_DELAY_MS } from "@strand/utils";

export const METADATA_PATH = "/metadata";

const parameterSchema = z.object({
  name: z.string().min(1),
  type: z.string().default("any"),
  description: z.string().default(""),
  required: z.boolean().default(true),
});

const activitySchema = z.object({
  name: z.string().min(1),
  description: z.string().default(""),
  timeout_seconds: z.number().nonnegative().max(Math.floor(MAX_TIMER_DELAY_MS / 1000)).default(300),
  retry_attempts: z.number().int().min(1).default(3),
  parameters: z.array(parameterSchema).default([]),
  returns: z
    .object({ type: z.string(), description: z.string().default("") })
    .nullable()
    .default(null),
});

export const workerMetadataSchema = z.object({
  service_name: z.string().min(1),
  task_queue: z.string().min(1),
  worker_identity: z.string().nullable().default(null),
  health: z.enum(["healthy", "degraded"]).default("healthy"),
  version: z.string().nullable().default(null),
  activities: z.array(activitySchema),
});

export type FetchFn = (url: string, init: { signal: AbortSignal }) => Promise<Response>;

export interface MetadataClient {
  /** Rejects on connection errors, timeouts, non-200 responses and invalid documents. */
  fetchMetadata(endpoint: WorkerEndpoint): Promise<DiscoveredService>;
}

export interface MetadataClientOptions {
  timeoutMs: number;
  fetchFn?: FetchFn;
}

export function endpointUrl(endpoint: WorkerEndpoint): string {
  return `http://${endpoint.host}:${endpoint.port}`;
}

export function createMetadataClient(options: MetadataClientOptions): MetadataClient {
  const fetchFn: FetchFn = options.fetchFn ?? ((url, init) => fetch(url, init));

  return {
    async fetchMetadata(endpoint) {
      const baseUrl = endpointUrl(endpoint);
      const response = await fetchFn(`${baseUrl}${METADATA_PATH}`, {
        signal: AbortSignal.timeout(options.timeoutMs),
      });

      if (response.status !== 200) {
        throw new Error(`Metadata endpoint ${baseUrl} responded with HTTP ${response.status}`);
      }

      const parsed = workerMetadataSchema.safeParse(await response.json());
      if (!parsed.success) {
        const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
        throw new Error(`Metadata endpoint ${baseUrl} returned an invalid document: ${issues.join("; ")}`);
      }

      const document = parsed.data;
      return {
        serviceName: document.service_name,
        taskQueue: document.task_queue,
        workerIdentity: document.worker_identity,
        health: document.health,
        version: document.version,
        endpoint: baseUrl,
        activities: Object.fromEntries(
          document.activities.map((activity) => [
            activity.name,
            {
              name: activity.name,
              description: activity.description,
              timeoutSeconds: activity.timeout_seconds,
              retryAttempts: activity.retry_attempts,
              parameters: activity.parameters,
              returns: activity.returns,
            },
          ])
        ),
      };
    },
  };
}
