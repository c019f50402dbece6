// ──────────────────────────────────────────────
// Strand - Static Configuration Loader
// YAML document → validated ServiceConfig
// ──────────────────────────────────────────────

import YAML from "yaml";
import { z } from "zod";
import type { ActivityDescriptor, ConfigSourceKind, PipelineDefinition } from "@strand/types";
import { ConfigurationError, MAX_TIMER_DELAY_MS, createLogger, sanitizeErrorMessage } from "@strand/utils";
import type { TransformRegistry } from "../transforms/index.js";
import { DEFAULT_TIMEOUT_MS, buildRetryPolicy } from "./defaults.js";
import { validatePipelines } from "./pipeline-validator.js";
import { createServiceConfig } from "./service-config.js";
import type { ServiceConfig } from "./service-config.js";

const logger = createLogger("static-config");

export const LOCAL_ACTIVITIES_KEY = "local_activities";
export const LOCAL_SERVICE_NAME = "local";

const MAX_TIMEOUT_MINUTES = Math.floor(MAX_TIMER_DELAY_MS / 60_000);
const MAX_INTERVAL_SECONDS = Math.floor(MAX_TIMER_DELAY_MS / 1000);

const activitySettingsSchema = z
  .object({
    timeout_minutes: z.number().positive().max(MAX_TIMEOUT_MINUTES).optional(),
    retry_attempts: z.number().int().min(1).optional(),
    retry_initial_interval_seconds: z.number().positive().max(MAX_INTERVAL_SECONDS).optional(),
    retry_maximum_interval_seconds: z.number().positive().max(MAX_INTERVAL_SECONDS).optional(),
    description: z.string().optional(),
  })
  .nullable();

const activityTableSchema = z.record(z.string(), activitySettingsSchema);

const remoteServiceSchema = z.object({
  task_queue: z.string().min(1),
  description: z.string().optional(),
  activities: activityTableSchema.default({}),
});

const stepSchema = z.object({
  activity: z.string().min(1),
  type: z.enum(["local", "remote"]).optional(),
  service: z.string().min(1).optional(),
  input_transform: z.string().min(1),
});

const pipelineSchema = z.object({
  name: z.string().min(1).optional(),
  description: z.string().optional(),
  steps: z.array(stepSchema),
});

const documentSchema = z.object({
  services: z.record(z.string(), z.unknown()).default({}),
  pipelines: z.record(z.string(), pipelineSchema).default({}),
});

type ActivitySettings = z.infer<typeof activitySettingsSchema>;

function formatIssues(error: z.ZodError, prefix: string[] = []): string[] {
  return error.issues.map((issue) => {
    const path = [...prefix, ...issue.path.map(String)].join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function toDescriptor(
  name: string,
  settings: ActivitySettings,
  placement: { serviceName: string; taskQueue: string | null }
): ActivityDescriptor {
  const timeoutMinutes = settings?.timeout_minutes;
  const initial = settings?.retry_initial_interval_seconds;
  const maximum = settings?.retry_maximum_interval_seconds;

  return {
    name,
    executionKind: placement.taskQueue === null ? "local" : "remote",
    taskQueue: placement.taskQueue,
    serviceName: placement.serviceName,
    timeoutMs: timeoutMinutes !== undefined ? Math.round(timeoutMinutes * 60_000) : DEFAULT_TIMEOUT_MS,
    retryPolicy: buildRetryPolicy({
      initialIntervalMs: initial !== undefined ? Math.round(initial * 1000) : undefined,
      maxIntervalMs: maximum !== undefined ? Math.round(maximum * 1000) : undefined,
      maxAttempts: settings?.retry_attempts,
    }),
    description: settings?.description,
  };
}

export interface StaticLoadOptions {
  transforms: TransformRegistry;
  source?: ConfigSourceKind;
}

export function parseServiceConfigDocument(text: string, options: StaticLoadOptions): ServiceConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Configuration document is not valid YAML: ${sanitizeErrorMessage(err)}`);
  }

  const parsed = documentSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const problems = formatIssues(parsed.error);
    throw new ConfigurationError(`Invalid configuration document: ${problems.join("; ")}`, problems);
  }

  const problems: string[] = [];
  const activities = new Map<string, ActivityDescriptor>();

  const addActivity = (descriptor: ActivityDescriptor): void => {
    const existing = activities.get(descriptor.name);
    if (existing) {
      problems.push(
        `Activity "${descriptor.name}" is declared by both "${existing.serviceName}" and "${descriptor.serviceName}"`
      );
      return;
    }
    activities.set(descriptor.name, descriptor);
  };

  for (const [serviceName, value] of Object.entries(parsed.data.services)) {
    if (serviceName === LOCAL_ACTIVITIES_KEY) {
      const local = activityTableSchema.safeParse(value ?? {});
      if (!local.success) {
        problems.push(...formatIssues(local.error, ["services", serviceName]));
        continue;
      }
      for (const [name, settings] of Object.entries(local.data)) {
        addActivity(toDescriptor(name, settings, { serviceName: LOCAL_SERVICE_NAME, taskQueue: null }));
      }
      continue;
    }

    const service = remoteServiceSchema.safeParse(value);
    if (!service.success) {
      problems.push(...formatIssues(service.error, ["services", serviceName]));
      continue;
    }
    for (const [name, settings] of Object.entries(service.data.activities)) {
      addActivity(toDescriptor(name, settings, { serviceName, taskQueue: service.data.task_queue }));
    }
  }

  const pipelines: PipelineDefinition[] = Object.entries(parsed.data.pipelines).map(([name, pipeline]) => ({
    name,
    displayName: pipeline.name ?? name,
    description: pipeline.description,
    origin: "declared",
    steps: pipeline.steps.map((step) => ({
      activityName: step.activity,
      transformName: step.input_transform,
      declaredKind: step.type,
      serviceName: step.service,
    })),
  }));

  problems.push(...validatePipelines(pipelines, activities, options.transforms).errors);

  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration document: ${problems.join("; ")}`, problems);
  }

  logger.info(
    { activities: activities.size, pipelines: pipelines.length },
    "Static service configuration loaded"
  );

  return createServiceConfig({
    source: options.source ?? "document",
    activities: activities.values(),
    pipelines,
  });
}
