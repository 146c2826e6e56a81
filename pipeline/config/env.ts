// pipeline/config/env.ts
import "dotenv/config";
import path from "node:path";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0", "yes", "no"])
  .transform((value) => value === "true" || value === "1" || value === "yes");

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

const schema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),

  OPENAI_API_KEY: z.string().min(1).optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  TRANSLATION_MODEL: z.string().min(1).default("gpt-5-mini"),
  TRANSLATION_REASONING_EFFORT: z.enum(["low", "medium", "high"]).optional(),
  ORACLE_MAX_OUTPUT_TOKENS: positiveInt.default(32_000),
  ORACLE_TIMEOUT_MS: positiveInt.default(600_000),

  TARGET_LANGUAGE: z.string().min(2).default("zh-CN"),
  TARGET_LANGUAGE_NAME: z.string().min(1).default("Simplified Chinese"),
  MAX_CHUNK_CHARS: positiveInt.default(12_000),

  CHUNK_CONCURRENCY: positiveInt.default(3),
  DOCUMENT_CONCURRENCY: positiveInt.default(2),
  ORACLE_CONCURRENCY: positiveInt.default(4),
  ORACLE_REQUESTS_PER_SECOND: z.coerce.number().positive().default(2),
  ORACLE_MAX_ATTEMPTS: positiveInt.default(4),
  ORACLE_RETRY_BASE_DELAY_MS: nonNegativeInt.default(2_000),
  ORACLE_RETRY_MAX_DELAY_MS: nonNegativeInt.default(60_000),
  ORACLE_CALL_BUDGET: positiveInt.optional(),

  OUTPUT_DIR: z.string().default("output"),
  ORIGIN_DIR: z.string().optional(),
  TRANS_DIR: z.string().optional(),
  STATE_BACKEND: z.enum(["file", "mongo"]).default("file"),
  STATE_FILE: z.string().optional(),
  MONGO_URI: z.string().optional(),
  MONGO_DB: z.string().default("html_book_translator"),
  URLS_FILE: z.string().default("pipeline/config/urls.txt"),
  TERMINOLOGY_FILE: z.string().optional(),

  USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (compatible; html-book-translator/0.1; +offline reading)"),
  FETCH_TIMEOUT_MS: positiveInt.default(30_000),
  FETCH_MAX_ATTEMPTS: positiveInt.default(3),
  FETCH_RETRY_DELAY_MS: nonNegativeInt.default(1_000),

  TRANSLATOR_NAME: z.string().min(1).optional(),
  ASSET_URL_RESOLUTION: booleanFlag.default("true"),
  LINK_LOCALIZATION: booleanFlag.default("true"),
  HEADER_INJECTION: booleanFlag.default("true"),
});

export type Env = z.infer<typeof schema>;

export interface PipelineConfig {
  env: Env;
  logLevel: Env["LOG_LEVEL"];
  targetLanguage: string;
  targetLanguageName: string;
  maxChunkChars: number;
  chunkConcurrency: number;
  documentConcurrency: number;
  oracle: {
    apiKey: string | undefined;
    baseURL: string | undefined;
    model: string;
    reasoningEffort: "low" | "medium" | "high" | undefined;
    maxOutputTokens: number;
    timeoutMs: number;
    concurrency: number;
    requestsPerSecond: number;
    callBudget: number | undefined;
  };
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
  };
  fetch: {
    userAgent: string;
    timeoutMs: number;
    maxAttempts: number;
    retryDelayMs: number;
  };
  paths: {
    outputDir: string;
    originDir: string;
    transDir: string;
    stateFile: string;
    urlsFile: string;
    terminologyFile: string | undefined;
  };
  state: {
    backend: "file" | "mongo";
    mongoUri: string | undefined;
    mongoDb: string;
  };
  postProcessing: {
    assetUrlResolution: boolean;
    linkLocalization: boolean;
    headerInjection: boolean;
    translatorName: string | undefined;
  };
}

export const loadConfig = (
  source: NodeJS.ProcessEnv = process.env,
): PipelineConfig => {
  const env = schema.parse(source);
  if (env.STATE_BACKEND === "mongo" && !env.MONGO_URI) {
    throw new Error("MONGO_URI is required when STATE_BACKEND=mongo");
  }
  const outputDir = env.OUTPUT_DIR;
  return {
    env,
    logLevel: env.LOG_LEVEL,
    targetLanguage: env.TARGET_LANGUAGE,
    targetLanguageName: env.TARGET_LANGUAGE_NAME,
    maxChunkChars: env.MAX_CHUNK_CHARS,
    chunkConcurrency: env.CHUNK_CONCURRENCY,
    documentConcurrency: env.DOCUMENT_CONCURRENCY,
    oracle: {
      apiKey: env.OPENAI_API_KEY,
      baseURL: env.OPENAI_BASE_URL,
      model: env.TRANSLATION_MODEL,
      reasoningEffort: env.TRANSLATION_REASONING_EFFORT,
      maxOutputTokens: env.ORACLE_MAX_OUTPUT_TOKENS,
      timeoutMs: env.ORACLE_TIMEOUT_MS,
      concurrency: env.ORACLE_CONCURRENCY,
      requestsPerSecond: env.ORACLE_REQUESTS_PER_SECOND,
      callBudget: env.ORACLE_CALL_BUDGET,
    },
    retry: {
      maxAttempts: env.ORACLE_MAX_ATTEMPTS,
      baseDelayMs: env.ORACLE_RETRY_BASE_DELAY_MS,
      maxDelayMs: Math.max(env.ORACLE_RETRY_MAX_DELAY_MS, env.ORACLE_RETRY_BASE_DELAY_MS),
    },
    fetch: {
      userAgent: env.USER_AGENT,
      timeoutMs: env.FETCH_TIMEOUT_MS,
      maxAttempts: env.FETCH_MAX_ATTEMPTS,
      retryDelayMs: env.FETCH_RETRY_DELAY_MS,
    },
    paths: {
      outputDir,
      originDir: env.ORIGIN_DIR ?? path.join(outputDir, "origin"),
      transDir: env.TRANS_DIR ?? path.join(outputDir, "trans"),
      stateFile: env.STATE_FILE ?? path.join(outputDir, "pipeline-state.json"),
      urlsFile: env.URLS_FILE,
      terminologyFile: env.TERMINOLOGY_FILE,
    },
    state: {
      backend: env.STATE_BACKEND,
      mongoUri: env.MONGO_URI,
      mongoDb: env.MONGO_DB,
    },
    postProcessing: {
      assetUrlResolution: env.ASSET_URL_RESOLUTION,
      linkLocalization: env.LINK_LOCALIZATION,
      headerInjection: env.HEADER_INJECTION,
      translatorName: env.TRANSLATOR_NAME,
    },
  };
};
