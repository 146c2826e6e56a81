import { test } from "node:test";
import assert from "node:assert/strict";
import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import {
  getTerminology,
  loadTerminologyFile,
  parseTerminology,
  resetTerminologyForTests,
  selectRelevantTerms,
} from "../terminology";

test("bundled terminology is loaded once and frozen", (t) => {
  resetTerminologyForTests();
  t.after(() => resetTerminologyForTests());
  const terminology = getTerminology();

  assert.equal(terminology.length, 32);
  assert.deepEqual(
    terminology.find((entry) => entry.source === "systolic array"),
    { source: "systolic array", target: "脉动阵列" },
  );
  assert.ok(Object.isFrozen(terminology));
  assert.ok(Object.isFrozen(terminology[0]));
  assert.equal(getTerminology("ignored-after-first-load.json"), terminology);
});

test("parseTerminology rejects blank renderings", () => {
  assert.throws(() => parseTerminology({ sharding: " " }));
  assert.throws(() => parseTerminology(["sharding"]));
});

test("loadTerminologyFile reads a custom table", async () => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "terminology-"));
  const filePath = path.join(dir, "terms.json");
  await writeFile(filePath, JSON.stringify({ pipeline: "流水线", GPU: "GPU" }), "utf8");

  assert.deepEqual(loadTerminologyFile(filePath), [
    { source: "pipeline", target: "流水线" },
    { source: "GPU", target: "GPU" },
  ]);
});

test("a configured terminology file replaces the bundled table", async (t) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), "terminology-"));
  const filePath = path.join(dir, "custom.json");
  await writeFile(filePath, JSON.stringify({ pipeline: "流水线" }), "utf8");
  resetTerminologyForTests();
  t.after(() => resetTerminologyForTests());

  assert.deepEqual(getTerminology(filePath), [{ source: "pipeline", target: "流水线" }]);
});

test("selectRelevantTerms keeps entries mentioned in the text", () => {
  const terminology = parseTerminology({
    "systolic array": "脉动阵列",
    roofline: "屋顶线",
    TPU: "TPU",
  });

  assert.deepEqual(
    selectRelevantTerms(terminology, "A Systolic Array inside every TPU core."),
    [
      { source: "systolic array", target: "脉动阵列" },
      { source: "TPU", target: "TPU" },
    ],
  );
});
