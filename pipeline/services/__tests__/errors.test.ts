import { test } from "node:test";
import assert from "node:assert/strict";

import {
  CancelledError,
  describeError,
  FetchError,
  isRetryable,
  MalformedOracleOutputError,
  OracleRejectedError,
  OracleUnavailableError,
  PipelineError,
  RetryExhaustedError,
  UnresolvedZoneError,
} from "../errors";

test("only transient failures are retryable", () => {
  assert.equal(isRetryable(new OracleUnavailableError("busy")), true);
  assert.equal(isRetryable(new MalformedOracleOutputError("bad json")), true);
  assert.equal(isRetryable(new OracleRejectedError("refused")), false);
  assert.equal(isRetryable(new CancelledError()), false);
  assert.equal(isRetryable(new FetchError("https://book.test/", "HTTP 503", { retryable: true })), true);
  assert.equal(isRetryable(new Error("plain")), false);
});

test("errors carry stable codes", () => {
  const exhausted = new RetryExhaustedError(4, new OracleUnavailableError("busy"));
  assert.ok(exhausted instanceof PipelineError);
  assert.equal(exhausted.code, "retry_exhausted");
  assert.equal(exhausted.message, "Gave up after 4 attempts: busy");
  assert.ok(exhausted.cause instanceof OracleUnavailableError);

  const unresolved = new UnresolvedZoneError(["CODE_PLACEHOLDER_001"]);
  assert.deepEqual(unresolved.tokens, ["CODE_PLACEHOLDER_001"]);

  const fetchError = new FetchError("https://book.test/", "HTTP 404", { status: 404 });
  assert.equal(fetchError.message, "Failed to fetch https://book.test/: HTTP 404");
  assert.equal(fetchError.status, 404);
});

test("describeError maps foreign errors to unexpected", () => {
  assert.deepEqual(describeError(new CancelledError()), {
    code: "cancelled",
    message: "Pipeline run cancelled",
  });
  assert.deepEqual(describeError(new TypeError("boom")), { code: "unexpected", message: "boom" });
  assert.deepEqual(describeError("text"), { code: "unexpected", message: "text" });
});
