import { test } from "node:test";
import assert from "node:assert/strict";
import path from "node:path";

import { loadConfig } from "../env";

test("loadConfig fills defaults for an empty environment", () => {
  const config = loadConfig({});

  assert.equal(config.targetLanguage, "zh-CN");
  assert.equal(config.targetLanguageName, "Simplified Chinese");
  assert.equal(config.maxChunkChars, 12_000);
  assert.equal(config.oracle.model, "gpt-5-mini");
  assert.equal(config.oracle.apiKey, undefined);
  assert.equal(config.state.backend, "file");
  assert.equal(config.paths.originDir, path.join("output", "origin"));
  assert.equal(config.paths.transDir, path.join("output", "trans"));
  assert.equal(config.paths.stateFile, path.join("output", "pipeline-state.json"));
  assert.equal(config.postProcessing.assetUrlResolution, true);
  assert.equal(config.postProcessing.linkLocalization, true);
  assert.equal(config.postProcessing.headerInjection, true);
  assert.deepEqual(config.retry, { maxAttempts: 4, baseDelayMs: 2_000, maxDelayMs: 60_000 });
});

test("loadConfig coerces numeric and boolean variables", () => {
  const config = loadConfig({
    OUTPUT_DIR: "build",
    CHUNK_CONCURRENCY: "5",
    ORACLE_REQUESTS_PER_SECOND: "0.5",
    ORACLE_CALL_BUDGET: "40",
    ASSET_URL_RESOLUTION: "no",
    LINK_LOCALIZATION: "false",
    HEADER_INJECTION: "0",
    TRANSLATOR_NAME: "Test Translator",
    TRANSLATION_REASONING_EFFORT: "low",
  });

  assert.equal(config.chunkConcurrency, 5);
  assert.equal(config.oracle.requestsPerSecond, 0.5);
  assert.equal(config.oracle.callBudget, 40);
  assert.equal(config.oracle.reasoningEffort, "low");
  assert.equal(config.paths.originDir, path.join("build", "origin"));
  assert.equal(config.postProcessing.assetUrlResolution, false);
  assert.equal(config.postProcessing.linkLocalization, false);
  assert.equal(config.postProcessing.headerInjection, false);
  assert.equal(config.postProcessing.translatorName, "Test Translator");
});

test("loadConfig never lets the retry ceiling drop below the base delay", () => {
  const config = loadConfig({
    ORACLE_RETRY_BASE_DELAY_MS: "5000",
    ORACLE_RETRY_MAX_DELAY_MS: "1000",
  });
  assert.equal(config.retry.maxDelayMs, 5_000);
});

test("loadConfig rejects invalid values", () => {
  assert.throws(() => loadConfig({ CHUNK_CONCURRENCY: "0" }));
  assert.throws(() => loadConfig({ STATE_BACKEND: "redis" }));
  assert.throws(() => loadConfig({ LINK_LOCALIZATION: "maybe" }));
});

test("mongo state backend requires a connection string", () => {
  assert.throws(() => loadConfig({ STATE_BACKEND: "mongo" }), /MONGO_URI/);
  const config = loadConfig({ STATE_BACKEND: "mongo", MONGO_URI: "mongodb://localhost:27017" });
  assert.equal(config.state.mongoDb, "html_book_translator");
});
