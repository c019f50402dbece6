// ──────────────────────────────────────────────
// Strand - Pipeline Service
// ──────────────────────────────────────────────

import type { PipelineResult, PipelineSummary } from "@strand/types";
import {
  DOCUMENT_PROCESSING_PIPELINE,
  DOCUMENT_RETRIEVAL_PIPELINE,
} from "@strand/engine";
import type { PipelineExecutor, ServiceConfig, ServiceConfigSource, ServiceConfigStore } from "@strand/engine";
import type { DiscoveryService } from "@strand/discovery";
import { ConfigurationError, createLogger, generateId, sanitizeErrorMessage } from "@strand/utils";
import type { PipelineConfigSource } from "@strand/utils";
import type { IndexDocumentsInput, QueryDocumentsInput } from "../validation/schemas.js";
import { createRunRegistry } from "./run-registry.js";
import type { RunRecord, RunRegistry } from "./run-registry.js";

const logger = createLogger("pipeline-service");

export interface PipelineCatalog {
  source: ServiceConfig["source"];
  loadedAt: string;
  pipelines: PipelineSummary[];
}

export interface ReloadSummary {
  source: ServiceConfig["source"];
  loadedAt: string;
  pipelines: string[];
  activities: string[];
}

export interface PipelineServiceOptions {
  executor: PipelineExecutor;
  store: ServiceConfigStore;
  /** YAML document read on a static reload. */
  configPath: string;
  /** Declared config a discovery reload layers the catalog over. */
  staticBase?: ServiceConfig;
  discovery?: DiscoveryService;
  runs?: RunRegistry;
}

export interface StartedRun {
  runId: string;
  pipelineName: string;
  status: RunRecord["status"];
}

export function createPipelineService(options: PipelineServiceOptions) {
  const { executor, store } = options;
  const runs = options.runs ?? createRunRegistry();
  const background = new Set<Promise<void>>();
  let staticBase: ServiceConfig | undefined =
    options.staticBase ?? (store.current().source === "discovery" ? undefined : store.current());

  /**
   * Starts a run that records its progress in the registry. `whenStarted`
   * settles once every step has resolved, or rejects with the
   * ConfigurationError that stopped the run before its first dispatch.
   */
  function launch(pipelineName: string, input: unknown, requestedRunId?: string) {
    const runId = requestedRunId ?? generateId();
    let markStarted: () => void = () => undefined;
    const started = new Promise<void>((resolve) => {
      markStarted = () => resolve();
    });

    const completion = executor.execute(pipelineName, input, {
      runId,
      onStart: ({ totalSteps }) => {
        runs.begin({ runId, pipelineName, totalSteps });
        markStarted();
      },
      onStepComplete: (entry) => runs.recordStep(runId, entry),
    });
    const recorded = completion.then(
      (result) => {
        runs.finish(result);
      },
      (err: unknown) => {
        if (runs.get(runId)?.status === "running") {
          logger.error({ runId, pipelineName, error: sanitizeErrorMessage(err) }, "Pipeline run aborted");
          runs.abort(runId, sanitizeErrorMessage(err));
        }
      }
    );

    const whenStarted = (): Promise<void> => Promise.race([started, completion.then(() => undefined)]);
    return { runId, completion, recorded, whenStarted };
  }

  async function runToCompletion(pipelineName: string, input: unknown, runId?: string): Promise<PipelineResult> {
    const run = launch(pipelineName, input, runId);
    const result = await run.completion;
    await run.recorded;
    return result;
  }

  function describePipelines(config: ServiceConfig): PipelineSummary[] {
    return config.listPipelines().map((pipeline) => ({
      name: pipeline.name,
      displayName: pipeline.displayName,
      description: pipeline.description ?? null,
      origin: pipeline.origin,
      steps: pipeline.steps.map((step) => {
        const descriptor = config.getActivityDescriptor(step.activityName);
        return {
          activityName: step.activityName,
          transformName: step.transformName,
          executionKind: descriptor?.executionKind ?? step.declaredKind ?? "remote",
          taskQueue: descriptor?.taskQueue ?? null,
        };
      }),
    }));
  }

  function reloadSource(kind: PipelineConfigSource): ServiceConfigSource {
    if (kind === "static") {
      return { kind: "file", path: options.configPath };
    }
    if (!options.discovery) {
      throw new ConfigurationError("Service discovery is not configured: set DISCOVERY_ENDPOINTS");
    }
    options.discovery.invalidate();
    return { kind: "discovery", provider: options.discovery, base: staticBase };
  }

  return {
    listPipelines(): PipelineCatalog {
      const config = store.current();
      return { source: config.source, loadedAt: config.loadedAt, pipelines: describePipelines(config) };
    },

    hasRun: (runId: string): boolean => runs.has(runId),

    getRun: (runId: string): RunRecord | undefined => runs.get(runId),

    execute: runToCompletion,

    /** Resolves once the run is underway; the result is read back with getRun. */
    async start(pipelineName: string, input: unknown, runId?: string): Promise<StartedRun> {
      const run = launch(pipelineName, input, runId);
      await run.whenStarted();
      const tracked: Promise<void> = run.recorded.finally(() => {
        background.delete(tracked);
      });
      background.add(tracked);
      return { runId: run.runId, pipelineName, status: runs.get(run.runId)?.status ?? "running" };
    },

    /** Waits for every background run to settle. */
    async drain(): Promise<void> {
      await Promise.all(background);
    },

    async query(input: QueryDocumentsInput): Promise<PipelineResult> {
      return runToCompletion(DOCUMENT_RETRIEVAL_PIPELINE, {
        query: input.query,
        collection: input.collection,
        top_k: input.top_k,
      });
    },

    async indexDocuments(input: IndexDocumentsInput): Promise<PipelineResult> {
      return runToCompletion(DOCUMENT_PROCESSING_PIPELINE, {
        documents: input.documents,
        collection: input.collection,
      });
    },

    async reload(kind: PipelineConfigSource): Promise<ReloadSummary> {
      const next = await store.reload(reloadSource(kind));
      if (kind === "static") {
        staticBase = next;
      }
      logger.info({ requested: kind, source: next.source }, "Service configuration reloaded");
      return {
        source: next.source,
        loadedAt: next.loadedAt,
        pipelines: next.listPipelines().map((pipeline) => pipeline.name),
        activities: next.listActivities().map((activity) => activity.name),
      };
    },
  };
}

export type PipelineService = ReturnType<typeof createPipelineService>;
