import { test } from "node:test";
import assert from "node:assert/strict";

import { fromStoredRecord } from "../mongoStateStore";

test("stored documents convert to pipeline records", () => {
  assert.deepEqual(
    fromStoredRecord({
      _id: "665f00000000000000000001",
      url: "https://book.test/a/",
      status: "failed",
      output_path: null,
      error_code: "oracle_rejected",
      error_message: "refused",
      created_at: new Date("2026-01-01T00:00:00.000Z"),
      updated_at: new Date("2026-01-02T00:00:00.000Z"),
    }),
    {
      url: "https://book.test/a/",
      status: "failed",
      outputPath: null,
      error: { code: "oracle_rejected", message: "refused" },
      updatedAt: "2026-01-02T00:00:00.000Z",
    },
  );

  assert.deepEqual(
    fromStoredRecord({ url: "https://book.test/b/", status: "persisted", output_path: "b.html" }),
    {
      url: "https://book.test/b/",
      status: "persisted",
      outputPath: "b.html",
      error: null,
      updatedAt: "1970-01-01T00:00:00.000Z",
    },
  );
});

test("documents with unknown error codes are rejected", () => {
  assert.throws(() =>
    fromStoredRecord({ url: "https://book.test/a/", status: "failed", error_code: "mystery" }),
  );
});
