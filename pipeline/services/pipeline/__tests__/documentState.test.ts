import { test } from "node:test";
import assert from "node:assert/strict";

import { InvalidTransitionError, OracleRejectedError } from "../../errors";
import { fragment } from "../../document/fragmenter";
import { segment } from "../../document/segmenter";
import { canTransition, DocumentStateMachine, isTerminal } from "../documentState";

test("transitions follow the pipeline order", () => {
  assert.equal(canTransition("pending", "fetched"), true);
  assert.equal(canTransition("translating", "translating"), true);
  assert.equal(canTransition("fragmented", "failed"), true);
  assert.equal(canTransition("pending", "segmented"), false);
  assert.equal(canTransition("translated", "translating"), false);
  assert.equal(canTransition("failed", "pending"), false);
  assert.equal(isTerminal("persisted"), true);
  assert.equal(isTerminal("failed"), true);
  assert.equal(isTerminal("translating"), false);
});

test("a document walks every stage to persisted", () => {
  const machine = new DocumentStateMachine("https://book.test/a/");
  const document = segment("<p>Hi</p>");
  const chunks = Array.from(fragment(document.layout.blocks, 100));
  const visited: string[] = [machine.status];

  const steps = [
    { status: "fetched", rawHtml: "<p>Hi</p>" },
    { status: "segmented", document },
    { status: "fragmented", document, chunks },
    { status: "translating", document, chunks, settled: 0, total: 1 },
    { status: "translating", document, chunks, settled: 1, total: 1 },
    { status: "translated", document, chunks, metadata: null },
    { status: "reassembled", html: "<p>嗨</p>" },
    { status: "persisted", outputPath: "out/a.html" },
  ] as const;
  for (const step of steps) {
    visited.push(machine.advance(step).status);
  }

  assert.deepEqual(visited, [
    "pending",
    "fetched",
    "segmented",
    "fragmented",
    "translating",
    "translating",
    "translated",
    "reassembled",
    "persisted",
  ]);
  assert.throws(() => machine.advance({ status: "fetched", rawHtml: "" }), InvalidTransitionError);
});

test("skipping a stage is rejected", () => {
  const machine = new DocumentStateMachine("https://book.test/a/");
  assert.throws(
    () => machine.advance({ status: "reassembled", html: "" }),
    (error: unknown) =>
      error instanceof InvalidTransitionError &&
      error.message === "Invalid document transition pending -> reassembled",
  );
  assert.equal(machine.status, "pending");
});

test("fail records the stage the document failed in", () => {
  const machine = new DocumentStateMachine("https://book.test/a/");
  machine.advance({ status: "fetched", rawHtml: "<p>Hi</p>" });
  const error = new OracleRejectedError("refused");

  const state = machine.fail(error);
  assert.deepEqual(state, { status: "failed", failedIn: "fetched", error });
  assert.throws(() => machine.fail(error), InvalidTransitionError);
});
