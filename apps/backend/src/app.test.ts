import test from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { DiscoveryService } from "@strand/discovery";
import {
  createActivityInvoker,
  createLocalActivityRegistry,
  createPipelineExecutor,
  createServiceConfigStore,
  buildServiceConfigFromCatalog,
  createTransformRegistry,
  parseServiceConfigDocument,
} from "@strand/engine";
import { createActivityCatalog, createInMemoryVectorStore } from "@strand/activities";
import { DiscoveryError } from "@strand/utils";
import { buildApp } from "./app.js";
import { createPipelineService } from "./services/pipeline.service.js";

const CONFIG_YAML = `
services:
  retriever_service:
    task_queue: retriever-task-queue
    activities:
      remote_search_activity: {}
  local_activities:
    chunk_documents_activity: {}
    embed_and_index_activity: {}
    search_documents_activity: {}
pipelines:
  document_processing:
    name: Document Processing
    steps:
      - activity: chunk_documents_activity
        input_transform: documents
      - activity: embed_and_index_activity
        input_transform: chunked_docs_with_collection
  document_retrieval:
    steps:
      - activity: search_documents_activity
        input_transform: query_with_collection
  remote_search:
    steps:
      - activity: remote_search_activity
        type: remote
        input_transform: query_with_collection
`;

const unreachableDiscovery: DiscoveryService = {
  discoverActiveTaskQueues: async () => {
    throw new DiscoveryError("Control plane unreachable: connect ECONNREFUSED 127.0.0.1:6379");
  },
  discoverServiceMetadata: async () => ({ services: {}, unreachable: [] }),
  discoverHybrid: async () => {
    throw new DiscoveryError("Control plane unreachable: connect ECONNREFUSED 127.0.0.1:6379");
  },
  getStatus: async () => ({
    servicesCount: 0,
    activitiesCount: 0,
    controlPlaneConnected: false,
    metadataEndpointsReachable: 0,
  }),
  invalidate: () => {},
};

async function buildTestHarness(options: { discovery?: DiscoveryService; startFromDiscovery?: boolean } = {}) {
  const transforms = createTransformRegistry();
  const dir = await mkdtemp(join(tmpdir(), "strand-backend-"));
  const configPath = join(dir, "services.yaml");
  await writeFile(configPath, CONFIG_YAML, "utf8");

  const staticConfig = parseServiceConfigDocument(CONFIG_YAML, { transforms });
  const initialConfig =
    options.startFromDiscovery && options.discovery
      ? buildServiceConfigFromCatalog(await options.discovery.discoverHybrid(), { transforms, base: staticConfig })
      : staticConfig;
  const store = createServiceConfigStore(initialConfig, { transforms });
  const executor = createPipelineExecutor({
    getConfig: () => store.current(),
    transforms,
    invoker: createActivityInvoker({
      local: createLocalActivityRegistry(createActivityCatalog({ vectorStore: createInMemoryVectorStore() })),
    }),
    defaultCollection: "document_chunks",
  });

  const pipelineService = createPipelineService({
    executor,
    store,
    configPath,
    staticBase: staticConfig,
    discovery: options.discovery,
  });
  const app = await buildApp({
    pipelineService,
    discovery: options.discovery,
    rateLimit: { max: 1000, windowMs: 60_000 },
    logLevel: false,
    nodeEnv: "test",
  });
  return { app, pipelineService };
}

async function buildTestApp(options: { discovery?: DiscoveryService } = {}) {
  return (await buildTestHarness(options)).app;
}

test("GET /api/health reports ok", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "GET", url: "/api/health" });

  assert.equal(response.statusCode, 200);
  assert.equal(response.json().status, "ok");
  await app.close();
});

test("GET /api/pipelines lists configured pipelines with their steps", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "GET", url: "/api/pipelines" });
  const body = response.json();

  assert.equal(response.statusCode, 200);
  assert.equal(body.data.source, "document");
  assert.deepEqual(body.data.pipelines[0], {
    name: "document_processing",
    displayName: "Document Processing",
    description: null,
    origin: "declared",
    steps: [
      {
        activityName: "chunk_documents_activity",
        transformName: "documents",
        executionKind: "local",
        taskQueue: null,
      },
      {
        activityName: "embed_and_index_activity",
        transformName: "chunked_docs_with_collection",
        executionKind: "local",
        taskQueue: null,
      },
    ],
  });
  await app.close();
});

test("indexed documents are returned by a query against the same collection", async () => {
  const app = await buildTestApp();

  const indexed = await app.inject({
    method: "POST",
    url: "/api/documents",
    payload: {
      documents: [{ id: "doc1", text: "Paragraph one.\n\nParagraph two." }],
      collection: "test",
    },
  });
  assert.equal(indexed.statusCode, 200);
  assert.equal(indexed.json().data.finalResult.indexed_count, 2);
  assert.equal(indexed.json().data.finalResult.collection_name, "test");

  const queried = await app.inject({
    method: "POST",
    url: "/api/query",
    payload: { query: "Paragraph two.", collection: "test", top_k: 1 },
  });
  const result = queried.json().data.finalResult;

  assert.equal(queried.statusCode, 200);
  assert.equal(result.total_results, 1);
  assert.equal(result.retrieved_documents[0].text, "Paragraph two.");
  await app.close();
});

test("executing an unknown pipeline answers 404", async () => {
  const app = await buildTestApp();
  const response = await app.inject({
    method: "POST",
    url: "/api/pipelines/nonexistent_pipeline/execute",
    payload: { input: {} },
  });

  assert.equal(response.statusCode, 404);
  assert.equal(response.json().error.code, "PIPELINE_NOT_FOUND");
  await app.close();
});

test("a failed run answers 422 with the failure", async () => {
  const app = await buildTestApp();
  const response = await app.inject({
    method: "POST",
    url: "/api/pipelines/document_retrieval/execute",
    payload: { input: { query: 5 } },
  });
  const body = response.json();

  assert.equal(response.statusCode, 422);
  assert.equal(body.error.code, "PIPELINE_FAILED");
  assert.equal(body.error.details.errorKind, "TransformError");
  assert.equal(body.error.details.failedAtStep, 0);
  await app.close();
});

test("a remote step without a transport is a configuration error", async () => {
  const app = await buildTestApp();
  const response = await app.inject({
    method: "POST",
    url: "/api/pipelines/remote_search/execute",
    payload: { input: "anything" },
  });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().error.code, "CONFIGURATION_ERROR");
  await app.close();
});

test("an invalid query body answers 400", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "POST", url: "/api/query", payload: { top_k: 0 } });

  assert.equal(response.statusCode, 400);
  assert.equal(response.json().error.code, "VALIDATION_ERROR");
  await app.close();
});

test("a static reload swaps in the configuration file", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "POST", url: "/api/config/reload", payload: { source: "static" } });
  const body = response.json();

  assert.equal(response.statusCode, 200);
  assert.equal(body.data.source, "file");
  assert.deepEqual(body.data.pipelines, ["document_processing", "document_retrieval", "remote_search"]);
  await app.close();
});

test("a discovery reload with an unreachable control plane answers 503", async () => {
  const app = await buildTestApp({ discovery: unreachableDiscovery });
  const response = await app.inject({ method: "POST", url: "/api/config/reload", payload: { source: "discovery" } });

  assert.equal(response.statusCode, 503);
  assert.equal(response.json().error.code, "DISCOVERY_UNAVAILABLE");

  const pipelines = await app.inject({ method: "GET", url: "/api/pipelines" });
  assert.equal(pipelines.json().data.source, "document");
  await app.close();
});

test("discovery routes answer 503 when discovery is not configured", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "GET", url: "/api/discovery/status" });

  assert.equal(response.statusCode, 503);
  assert.equal(response.json().error.code, "DISCOVERY_DISABLED");
  await app.close();
});

test("GET /api/discovery/status reports the discovery service status", async () => {
  const app = await buildTestApp({ discovery: unreachableDiscovery });
  const response = await app.inject({ method: "GET", url: "/api/discovery/status" });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json().data, {
    servicesCount: 0,
    activitiesCount: 0,
    controlPlaneConnected: false,
    metadataEndpointsReachable: 0,
  });
  await app.close();
});

test("a discovery reload after starting from discovery keeps the declared pipelines", async () => {
  const emptyCatalog: DiscoveryService = {
    ...unreachableDiscovery,
    discoverHybrid: async () => ({ services: {}, activeTaskQueues: [], discoveredAt: "2026-01-01T00:00:00.000Z" }),
  };
  const { app } = await buildTestHarness({ discovery: emptyCatalog, startFromDiscovery: true });

  const response = await app.inject({ method: "POST", url: "/api/config/reload", payload: { source: "discovery" } });
  const body = response.json();

  assert.equal(response.statusCode, 200);
  assert.equal(body.data.source, "discovery");
  assert.deepEqual(body.data.pipelines, ["document_processing", "document_retrieval", "remote_search"]);
  assert.deepEqual([...body.data.activities].sort(), [
    "chunk_documents_activity",
    "embed_and_index_activity",
    "remote_search_activity",
    "search_documents_activity",
  ]);
  await app.close();
});

test("a started run answers 202 with its id and is read back once finished", async () => {
  const { app, pipelineService } = await buildTestHarness();

  const started = await app.inject({
    method: "POST",
    url: "/api/pipelines/document_processing/runs",
    payload: { input: { documents: [{ id: "doc1", text: "Paragraph one.\n\nParagraph two." }] }, runId: "run-async-1" },
  });
  assert.equal(started.statusCode, 202);
  assert.equal(started.json().data.runId, "run-async-1");
  assert.equal(started.json().data.pipelineName, "document_processing");

  await pipelineService.drain();

  const response = await app.inject({ method: "GET", url: "/api/runs/run-async-1" });
  const run = response.json().data;
  assert.equal(response.statusCode, 200);
  assert.equal(run.status, "completed");
  assert.equal(run.totalSteps, 2);
  assert.equal(run.stepsCompleted, 2);
  assert.deepEqual(
    run.stepTrace.map((entry: { activityName: string }) => entry.activityName),
    ["chunk_documents_activity", "embed_and_index_activity"]
  );
  assert.equal(run.result.status, "completed");
  assert.equal(run.error, null);
  await app.close();
});

test("starting a run of an unknown pipeline answers 404 and records nothing", async () => {
  const { app, pipelineService } = await buildTestHarness();

  const response = await app.inject({
    method: "POST",
    url: "/api/pipelines/no_such_pipeline/runs",
    payload: { input: "x", runId: "run-missing" },
  });

  assert.equal(response.statusCode, 404);
  assert.equal(response.json().error.code, "PIPELINE_NOT_FOUND");
  assert.equal(pipelineService.hasRun("run-missing"), false);
  await app.close();
});

test("synchronous executions are recorded and run ids cannot be reused", async () => {
  const app = await buildTestApp();

  const executed = await app.inject({
    method: "POST",
    url: "/api/pipelines/document_retrieval/execute",
    payload: { input: "paragraph", runId: "run-sync-1" },
  });
  assert.equal(executed.statusCode, 200);

  const lookup = await app.inject({ method: "GET", url: "/api/runs/run-sync-1" });
  assert.equal(lookup.json().data.status, "completed");
  assert.equal(lookup.json().data.stepsCompleted, 1);

  const reused = await app.inject({
    method: "POST",
    url: "/api/pipelines/document_retrieval/runs",
    payload: { input: "paragraph", runId: "run-sync-1" },
  });
  assert.equal(reused.statusCode, 409);
  assert.deepEqual(reused.json().error, { code: "RUN_EXISTS", message: 'Run "run-sync-1" already exists' });
  await app.close();
});

test("GET /api/runs/:runId answers 404 for an unknown run", async () => {
  const app = await buildTestApp();
  const response = await app.inject({ method: "GET", url: "/api/runs/run-unknown" });

  assert.equal(response.statusCode, 404);
  assert.deepEqual(response.json(), {
    success: false,
    error: { code: "RUN_NOT_FOUND", message: 'Run "run-unknown" not found' },
  });
  await app.close();
});
