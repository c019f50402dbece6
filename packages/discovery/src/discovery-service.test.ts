import test from "node:test";
import assert from "node:assert/strict";
import type { TaskQueueDescription, WorkerEndpoint, WorkerMetadataDocument } from "@strand/types";
import { DiscoveryError } from "@strand/utils";
import {
  CONTROL_QUEUE,
  buildQueueCandidates,
  createBullMQControlPlane,
  createDiscoveryService,
  createMetadataClient,
  queueNameVariants,
} from "./index.js";
import type { ControlPlane, FetchFn, QueueHandle, QueueOpener } from "./index.js";

function metadataDocument(serviceName: string, taskQueue: string, activities: string[]): WorkerMetadataDocument {
  return {
    service_name: serviceName,
    task_queue: taskQueue,
    worker_identity: `${serviceName}@test-host`,
    health: "healthy",
    version: "1.0.0",
    activities: activities.map((name) => ({
      name,
      description: `${name} description`,
      timeout_seconds: 300,
      retry_attempts: 3,
      parameters: [{ name: "input", type: "object", description: "payload", required: true }],
      returns: { type: "object", description: "result" },
    })),
  };
}

type Reply = WorkerMetadataDocument | number | Error | Record<string, unknown>;

function fakeFetch(replies: Record<string, Reply>, calls: string[] = []): FetchFn {
  return async (url) => {
    calls.push(url);
    const reply = replies[url];
    if (reply === undefined || reply instanceof Error) {
      throw reply ?? new TypeError("fetch failed");
    }
    if (typeof reply === "number") {
      return new Response("unavailable", { status: reply });
    }
    return new Response(JSON.stringify(reply), { status: 200, headers: { "content-type": "application/json" } });
  };
}

function fakeControlPlane(activeQueues: string[], options: { reachable?: boolean; failing?: string[] } = {}) {
  const described: string[] = [];
  let checks = 0;
  const controlPlane: ControlPlane = {
    async checkConnection() {
      checks++;
      if (options.reachable === false) throw new Error("connect ECONNREFUSED 127.0.0.1:6379");
    },
    async describeTaskQueue(name): Promise<TaskQueueDescription> {
      described.push(name);
      if (options.failing?.includes(name)) throw new Error(`describe ${name} failed`);
      return {
        name,
        pollers: activeQueues.includes(name) ? [{ identity: `${name}-worker`, address: "10.0.0.1:5000" }] : [],
      };
    },
    async close() {},
  };
  return { controlPlane, described, checkCount: () => checks };
}

const endpoint = (host: string): WorkerEndpoint => ({ host, port: 8080 });

test("queue name variants cover the usual naming conventions", () => {
  assert.deepEqual(queueNameVariants("embedding_service"), [
    "embedding_service-task-queue",
    "embedding-service-task-queue",
    "embedding_service-queue",
    "embedding-task-queue",
  ]);
  assert.deepEqual(buildQueueCandidates(["custom-queue"], ["search"]), [
    "custom-queue",
    "search-queue",
    "search-task-queue",
  ]);
});

test("metadata discovery keeps reachable workers when others fail", async () => {
  const { controlPlane } = fakeControlPlane([]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: ["w1", "w2", "w3", "w4", "w5"].map(endpoint),
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
        "http://w2:8080/metadata": new TypeError("fetch failed"),
        "http://w3:8080/metadata": metadataDocument("search_service", "search-task-queue", ["search_documents_activity"]),
        "http://w4:8080/metadata": 503,
        "http://w5:8080/metadata": metadataDocument("health_service", "health-task-queue", ["health_check_activity"]),
      }),
    }),
  });

  const result = await discovery.discoverServiceMetadata();

  assert.deepEqual(Object.keys(result.services).sort(), ["embedding_service", "health_service", "search_service"]);
  assert.deepEqual(result.unreachable, ["http://w2:8080", "http://w4:8080"]);
  assert.deepEqual(result.services["search_service"]?.activities["search_documents_activity"], {
    name: "search_documents_activity",
    description: "search_documents_activity description",
    timeoutSeconds: 300,
    retryAttempts: 3,
    parameters: [{ name: "input", type: "object", description: "payload", required: true }],
    returns: { type: "object", description: "result" },
  });
  assert.equal(result.services["search_service"]?.endpoint, "http://w3:8080");
});

test("an invalid metadata document is skipped", async () => {
  const { controlPlane } = fakeControlPlane([]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({ "http://w1:8080/metadata": { service_name: "broken" } }),
    }),
  });

  const result = await discovery.discoverServiceMetadata();
  assert.deepEqual(result, { services: {}, unreachable: ["http://w1:8080"] });
});

test("active task queues are those with pollers; describe failures are skipped", async () => {
  const { controlPlane, described } = fakeControlPlane(["embedding-task-queue", "search-task-queue"], {
    failing: ["search-task-queue"],
  });
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    serviceNames: ["search_service"],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
      }),
    }),
  });

  const active = await discovery.discoverActiveTaskQueues();

  assert.deepEqual(active, ["embedding-task-queue"]);
  assert.ok(described.includes("search-task-queue"));
  assert.ok(described.includes("embedding-service-task-queue"));
});

test("hybrid discovery marks services active or inactive and keeps both", async () => {
  const { controlPlane } = fakeControlPlane(["embedding-task-queue"]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1"), endpoint("w2")],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
        "http://w2:8080/metadata": metadataDocument("search_service", "search-task-queue", ["search_documents_activity"]),
      }),
    }),
    now: () => Date.parse("2026-03-01T12:00:00.000Z"),
  });

  const catalog = await discovery.discoverHybrid();

  assert.equal(catalog.services["embedding_service"]?.queueStatus, "active");
  assert.equal(catalog.services["search_service"]?.queueStatus, "inactive");
  assert.deepEqual(catalog.activeTaskQueues, ["embedding-task-queue"]);
  assert.equal(catalog.discoveredAt, "2026-03-01T12:00:00.000Z");
});

test("an unreachable control plane fails hybrid discovery with DiscoveryError", async () => {
  const { controlPlane } = fakeControlPlane([], { reachable: false });
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
      }),
    }),
  });

  await assert.rejects(
    discovery.discoverHybrid(),
    (err: unknown) =>
      err instanceof DiscoveryError && err.message === "Control plane unreachable: connect ECONNREFUSED 127.0.0.1:6379"
  );
  await assert.rejects(discovery.discoverActiveTaskQueues({}), DiscoveryError);
});

test("the catalog is served from cache within the TTL", async () => {
  let clock = 1_000;
  const fetchCalls: string[] = [];
  const { controlPlane, described, checkCount } = fakeControlPlane(["embedding-task-queue"]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    cacheTtlMs: 30_000,
    now: () => clock,
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(
        {
          "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
        },
        fetchCalls
      ),
    }),
  });

  const first = await discovery.discoverHybrid();
  const describedAfterFirst = described.length;

  clock += 29_999;
  const second = await discovery.discoverHybrid();
  assert.equal(second, first);
  assert.equal(fetchCalls.length, 1);
  assert.equal(checkCount(), 1);
  assert.equal(described.length, describedAfterFirst);

  clock += 1;
  const third = await discovery.discoverHybrid();
  assert.notEqual(third, first);
  assert.equal(fetchCalls.length, 2);

  discovery.invalidate();
  const fourth = await discovery.discoverHybrid();
  assert.notEqual(fourth, third);
  assert.equal(fetchCalls.length, 3);
});

test("concurrent cold callers share one discovery pass", async () => {
  const fetchCalls: string[] = [];
  const { controlPlane } = fakeControlPlane(["embedding-task-queue"]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch(
        {
          "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
        },
        fetchCalls
      ),
    }),
  });

  const [a, b] = await Promise.all([discovery.discoverHybrid(), discovery.discoverHybrid()]);

  assert.equal(a, b);
  assert.equal(fetchCalls.length, 1);
});

test("status reports counts and reachability", async () => {
  const { controlPlane } = fakeControlPlane(["embedding-task-queue"]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1"), endpoint("w2")],
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", [
          "embed_and_index_activity",
          "chunk_documents_activity",
        ]),
      }),
    }),
  });

  assert.deepEqual(await discovery.getStatus(), {
    servicesCount: 1,
    activitiesCount: 2,
    controlPlaneConnected: true,
    metadataEndpointsReachable: 1,
  });
});

test("a control plane that never answers fails discovery once the check times out", async () => {
  const silent: ControlPlane = {
    checkConnection: () => new Promise<void>(() => undefined),
    describeTaskQueue: () => new Promise<TaskQueueDescription>(() => undefined),
    async close() {},
  };
  const discovery = createDiscoveryService({
    controlPlane: silent,
    endpoints: [endpoint("w1")],
    controlPlaneTimeoutMs: 20,
    metadataClient: createMetadataClient({
      timeoutMs: 1000,
      fetchFn: fakeFetch({
        "http://w1:8080/metadata": metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]),
      }),
    }),
  });

  await assert.rejects(
    discovery.discoverHybrid(),
    (err: unknown) =>
      err instanceof DiscoveryError &&
      err.message === "Control plane unreachable: Control plane check timed out after 20ms"
  );
  assert.equal((await discovery.getStatus()).controlPlaneConnected, false);
});

test("invalidate during a pass starts a fresh pass whose catalog is the one cached", async () => {
  const fetchCalls: string[] = [];
  const releases: Array<() => void> = [];
  const fetchFn: FetchFn = async (url) => {
    fetchCalls.push(url);
    await new Promise<void>((resolve) => releases.push(resolve));
    const document = metadataDocument("embedding_service", "embedding-task-queue", ["embed_and_index_activity"]);
    return new Response(JSON.stringify(document), { status: 200, headers: { "content-type": "application/json" } });
  };
  const waitForFetches = async (count: number): Promise<void> => {
    while (releases.length < count) await new Promise((resolve) => setImmediate(resolve));
  };
  const { controlPlane } = fakeControlPlane(["embedding-task-queue"]);
  const discovery = createDiscoveryService({
    controlPlane,
    endpoints: [endpoint("w1")],
    metadataClient: createMetadataClient({ timeoutMs: 1000, fetchFn }),
  });

  const stale = discovery.discoverHybrid();
  await waitForFetches(1);
  discovery.invalidate();
  const fresh = discovery.discoverHybrid();
  await waitForFetches(2);
  assert.equal(fetchCalls.length, 2);

  releases[1]?.();
  const freshCatalog = await fresh;
  releases[0]?.();
  const staleCatalog = await stale;

  assert.notEqual(staleCatalog, freshCatalog);
  assert.equal(await discovery.discoverHybrid(), freshCatalog);
  assert.equal(fetchCalls.length, 2);
});

test("the BullMQ control plane describes every queue over one connection and closes each handle", async () => {
  const opened: Array<{ name: string; shared: string | null }> = [];
  const closed: string[] = [];
  const names = new Map<QueueHandle, string>();
  const openQueue: QueueOpener = async (name, shared) => {
    opened.push({ name, shared: shared ? (names.get(shared) ?? "unknown") : null });
    const handle: QueueHandle = {
      ping: async () => "PONG",
      getWorkers: async () =>
        name === "embedding-task-queue" ? [{ name: "worker-1", id: "7", addr: "10.0.0.2:5000" }] : [],
      close: async () => {
        closed.push(name);
      },
    };
    names.set(handle, name);
    return handle;
  };
  const controlPlane = createBullMQControlPlane({ connection: { host: "localhost", port: 6379 }, openQueue });

  await controlPlane.checkConnection();
  const active = await controlPlane.describeTaskQueue("embedding-task-queue");
  const idle = await controlPlane.describeTaskQueue("search-task-queue");

  assert.deepEqual(active.pollers, [{ identity: "worker-1", address: "10.0.0.2:5000" }]);
  assert.deepEqual(idle.pollers, []);
  assert.deepEqual(opened, [
    { name: CONTROL_QUEUE, shared: null },
    { name: "embedding-task-queue", shared: CONTROL_QUEUE },
    { name: "search-task-queue", shared: CONTROL_QUEUE },
  ]);
  assert.deepEqual(closed, ["embedding-task-queue", "search-task-queue"]);

  await controlPlane.close();
  assert.deepEqual(closed, ["embedding-task-queue", "search-task-queue", CONTROL_QUEUE]);
});
