import test from "node:test";
import assert from "node:assert/strict";
import { NonRetryableActivityError } from "@strand/utils";
import { toDispatchError } from "./activity-transport.js";

test("a marked job failure becomes a non-retryable error without the marker", () => {
  const err = toDispatchError(new Error("[non-retryable] Invalid arguments for search_documents_activity: Invalid input"));

  assert.ok(err instanceof NonRetryableActivityError);
  assert.equal(err.message, "Invalid arguments for search_documents_activity: Invalid input");
});

test("other job failures are passed through for retry", () => {
  const original = new Error("connection reset");
  assert.equal(toDispatchError(original), original);
  assert.equal(toDispatchError("worker crashed").message, "worker crashed");
});
