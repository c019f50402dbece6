import test from "node:test";
import assert from "node:assert/strict";
import type { VectorStore } from "@strand/types";
import { createActivityCatalog, createInMemoryVectorStore, selectActivities } from "@strand/activities";
import { buildMetadataServer } from "./metadata-server.js";

function server(vectorStore: VectorStore) {
  const activities = selectActivities(createActivityCatalog({ vectorStore }), ["health_check_activity"]);
  return buildMetadataServer({
    serviceName: "health_service",
    taskQueue: "health-task-queue",
    workerIdentity: "health_service@test-host:1",
    version: "1.2.3",
    activities,
    vectorStore,
  });
}

test("GET /metadata publishes the hosted activities", async () => {
  const app = server(createInMemoryVectorStore());

  const response = await app.inject({ method: "GET", url: "/metadata" });

  assert.equal(response.statusCode, 200);
  assert.deepEqual(response.json(), {
    service_name: "health_service",
    task_queue: "health-task-queue",
    worker_identity: "health_service@test-host:1",
    health: "healthy",
    version: "1.2.3",
    activities: [
      {
        name: "health_check_activity",
        description: "Report that the activity worker is reachable",
        timeout_seconds: 30,
        retry_attempts: 1,
        parameters: [],
        returns: { type: "string", description: "Health message" },
      },
    ],
  });
  await app.close();
});

test("health degrades when the vector store cannot be reached", async () => {
  const app = server({ ...createInMemoryVectorStore(), ping: async () => false });

  const health = await app.inject({ method: "GET", url: "/health" });
  const metadata = await app.inject({ method: "GET", url: "/metadata" });

  assert.deepEqual(health.json(), { status: "degraded" });
  assert.equal(metadata.json().health, "degraded");
  await app.close();
});

test("GET /health reports a healthy worker", async () => {
  const app = server(createInMemoryVectorStore());
  const response = await app.inject({ method: "GET", url: "/health" });
  assert.deepEqual(response.json(), { status: "healthy" });
  await app.close();
});
