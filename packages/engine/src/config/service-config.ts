// ──────────────────────────────────────────────
// Strand - Service Configuration
// Immutable activity and pipeline tables
// ──────────────────────────────────────────────

import type { ActivityDescriptor, ConfigSourceKind, PipelineDefinition } from "@strand/types";
import { ConfigurationError } from "@strand/utils";

export interface ServiceConfig {
  readonly source: ConfigSourceKind;
  readonly loadedAt: string;
  getActivityDescriptor(name: string): ActivityDescriptor | undefined;
  getPipelineDefinition(name: string): PipelineDefinition | undefined;
  requireActivity(name: string): ActivityDescriptor;
  requirePipeline(name: string): PipelineDefinition;
  listActivities(): ActivityDescriptor[];
  listPipelines(): PipelineDefinition[];
}

export interface ServiceConfigTables {
  source: ConfigSourceKind;
  activities: Iterable<ActivityDescriptor>;
  pipelines: Iterable<PipelineDefinition>;
  loadedAt?: string;
}

function freezeDescriptor(descriptor: ActivityDescriptor): ActivityDescriptor {
  return Object.freeze({ ...descriptor, retryPolicy: Object.freeze({ ...descriptor.retryPolicy }) });
}

function freezePipeline(pipeline: PipelineDefinition): PipelineDefinition {
  return Object.freeze({
    ...pipeline,
    steps: Object.freeze(pipeline.steps.map((step) => Object.freeze({ ...step }))),
  });
}

export function createServiceConfig(tables: ServiceConfigTables): ServiceConfig {
  const activities = new Map<string, ActivityDescriptor>();
  const pipelines = new Map<string, PipelineDefinition>();

  for (const descriptor of tables.activities) {
    activities.set(descriptor.name, freezeDescriptor(descriptor));
  }
  for (const pipeline of tables.pipelines) {
    pipelines.set(pipeline.name, freezePipeline(pipeline));
  }

  return Object.freeze({
    source: tables.source,
    loadedAt: tables.loadedAt ?? new Date().toISOString(),

    getActivityDescriptor: (name: string) => activities.get(name),
    getPipelineDefinition: (name: string) => pipelines.get(name),

    requireActivity(name: string): ActivityDescriptor {
      const descriptor = activities.get(name);
      if (!descriptor) {
        throw new ConfigurationError(
          `Activity "${name}" is not configured. Available activities: ${Array.from(activities.keys()).join(", ")}`,
          undefined,
          "ACTIVITY_NOT_FOUND"
        );
      }
      return descriptor;
    },

    requirePipeline(name: string): PipelineDefinition {
      const pipeline = pipelines.get(name);
      if (!pipeline) {
        throw new ConfigurationError(
          `Pipeline "${name}" is not configured. Available pipelines: ${Array.from(pipelines.keys()).join(", ")}`,
          undefined,
          "PIPELINE_NOT_FOUND"
        );
      }
      return pipeline;
    },

    listActivities: () => Array.from(activities.values()),
    listPipelines: () => Array.from(pipelines.values()),
  });
}
