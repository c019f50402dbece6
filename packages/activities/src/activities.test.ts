import test from "node:test";
import assert from "node:assert/strict";
import type { ActivityContext, VectorPoint, VectorStore } from "@strand/types";
import { ConfigurationError, NonRetryableActivityError, createLogger, isRecord, toActivityLogger } from "@strand/utils";
import {
  HASH_EMBEDDING_MODEL,
  createActivityCatalog,
  createChunkDocumentsActivity,
  createEmbedAndIndexActivity,
  createHashEmbedder,
  createInMemoryVectorStore,
  createSearchDocumentsActivity,
  healthCheckActivity,
  selectActivities,
} from "./index.js";

function context(activityName: string): ActivityContext {
  return {
    activityName,
    runId: "run-test",
    attempt: 1,
    signal: new AbortController().signal,
    logger: toActivityLogger(createLogger("activities-test")),
  };
}

const embedder = createHashEmbedder();

function records(value: unknown): Record<string, unknown>[] {
  assert.ok(Array.isArray(value));
  return value.filter(isRecord);
}

test("the hash embedder is deterministic and sized", () => {
  const first = embedder.embed("vector search");
  assert.equal(first.length, 64);
  assert.deepEqual(embedder.embed("vector search"), first);
  assert.notDeepEqual(embedder.embed("something else"), first);
  assert.equal(embedder.model, HASH_EMBEDDING_MODEL);
});

test("chunking splits paragraphs and records their position", async () => {
  const activity = createChunkDocumentsActivity();
  const chunks = records(
    await activity.run(
      [
        { id: "doc1", text: "First paragraph.\n\nSecond paragraph.", metadata: { source: "notes" } },
        { id: "doc2", text: "   " },
      ],
      context(activity.name)
    )
  );

  assert.deepEqual(
    chunks.map((chunk) => [chunk["text"], chunk["metadata"]]),
    [
      ["First paragraph.", { source: "notes", original_doc_id: "doc1", chunk_index: 0, total_chunks: 2 }],
      ["Second paragraph.", { source: "notes", original_doc_id: "doc1", chunk_index: 1, total_chunks: 2 }],
    ]
  );
  assert.notEqual(chunks[0]?.["id"], chunks[1]?.["id"]);
});

test("a long paragraph is windowed with overlap", async () => {
  const activity = createChunkDocumentsActivity({ maxChunkChars: 10, overlapChars: 2 });
  const chunks = records(await activity.run([{ id: "doc1", text: "abcdefghijklmnop" }], context(activity.name)));

  assert.deepEqual(
    chunks.map((chunk) => chunk["text"]),
    ["abcdefghij", "ijklmnop"]
  );
});

test("documents without string text are rejected as non-retryable", async () => {
  const activity = createChunkDocumentsActivity();
  await assert.rejects(
    activity.run([{ id: "doc1", text: 42 }], context(activity.name)),
    (err: unknown) =>
      err instanceof NonRetryableActivityError &&
      err.message === "Invalid arguments for chunk_documents_activity: 0.text: Expected string, received number"
  );
});

test("indexed chunks are searchable by their own text", async () => {
  const vectorStore = createInMemoryVectorStore();
  const index = createEmbedAndIndexActivity({ vectorStore, embedder });
  const search = createSearchDocumentsActivity({ vectorStore, embedder });

  const indexed = await index.run(
    [
      [
        { id: "c1", text: "alpha" },
        { id: "c2", text: "beta" },
        { id: "c3", text: "gamma" },
      ],
      "test",
    ],
    context(index.name)
  );
  assert.ok(isRecord(indexed));

  assert.equal(indexed["status"], "success");
  assert.equal(indexed["indexed_count"], 3);
  assert.equal(indexed["collection_name"], "test");
  assert.equal(indexed["embedding_model"], HASH_EMBEDDING_MODEL);

  const found = await search.run(["beta", "test", 2], context(search.name));
  assert.ok(isRecord(found));
  const [top] = records(found["retrieved_documents"]);

  assert.equal(found["query"], "beta");
  assert.equal(found["total_results"], 2);
  assert.equal(top?.["id"], "c2");
  assert.equal(top?.["text"], "beta");
  const score = top?.["score"];
  assert.ok(typeof score === "number" && Math.abs(score - 1) < 1e-9);
});

test("search accepts packed arguments and defaults top_k to 5", async () => {
  const searched: Array<[string, number]> = [];
  const vectorStore: VectorStore = {
    upsert: async () => {},
    search: async (collection, _vector, topK) => {
      searched.push([collection, topK]);
      return [];
    },
    ping: async () => true,
  };
  const search = createSearchDocumentsActivity({ vectorStore, embedder });

  await search.run([["q", "packed", 3]], context(search.name));
  await search.run(["q", "direct"], context(search.name));

  assert.deepEqual(searched, [
    ["packed", 3],
    ["direct", 5],
  ]);
});

test("a search of an empty collection returns no documents", async () => {
  const search = createSearchDocumentsActivity({ vectorStore: createInMemoryVectorStore(), embedder });
  const result = await search.run(["anything", "empty"], context(search.name));
  assert.ok(isRecord(result));

  assert.deepEqual(result["retrieved_documents"], []);
  assert.equal(result["total_results"], 0);
});

test("indexing the same id twice replaces the point", async () => {
  const upserts: VectorPoint[][] = [];
  const memory = createInMemoryVectorStore();
  const vectorStore: VectorStore = {
    ...memory,
    upsert: async (collection, points) => {
      upserts.push(points);
      await memory.upsert(collection, points);
    },
  };
  const index = createEmbedAndIndexActivity({ vectorStore, embedder });

  await index.run([[{ id: "c1", text: "old" }], "test"], context(index.name));
  await index.run([[{ id: "c1", text: "new" }], "test"], context(index.name));

  const matches = await memory.search("test", embedder.embed("new"), 10);
  assert.deepEqual(
    matches.map((match) => [match.id, match.text]),
    [["c1", "new"]]
  );
  assert.equal(upserts.length, 2);
});

test("the health check reports a healthy worker", async () => {
  assert.equal(await healthCheckActivity.run([], context(healthCheckActivity.name)), "Activity worker is healthy");
});

test("activity selection keeps catalog order and rejects unknown names", () => {
  const catalog = createActivityCatalog({ vectorStore: createInMemoryVectorStore() });

  assert.deepEqual(
    catalog.map((activity) => activity.name),
    ["chunk_documents_activity", "embed_and_index_activity", "search_documents_activity", "health_check_activity"]
  );
  assert.deepEqual(
    selectActivities(catalog, ["health_check_activity", "embed_and_index_activity"]).map((activity) => activity.name),
    ["embed_and_index_activity", "health_check_activity"]
  );
  assert.equal(selectActivities(catalog, []).length, 4);
  assert.throws(() => selectActivities(catalog, ["translate_activity"]), ConfigurationError);
});
