import type { PipelineConfig } from "./config/env";
import { getTerminology } from "./config/terminology";
import { connectMongo } from "./db/mongo";
import {
  AssetUrlResolver,
  HeaderInjector,
  LinkLocalizer,
  type DocumentPostProcessor,
} from "./services/document/postProcessors";
import type { Logger } from "./services/logger";
import { getOpenAIClient } from "./services/openaiClient";
import { FileDocumentWriter } from "./services/pipeline/documentWriter";
import { CachedPageFetcher, HttpPageFetcher } from "./services/pipeline/fetcher";
import { MongoPipelineStateStore } from "./services/pipeline/mongoStateStore";
import type { PipelineDependencies, PipelineOptions } from "./services/pipeline/orchestrator";
import {
  FilePipelineStateStore,
  type PipelineStateStore,
} from "./services/pipeline/stateStore";
import type { PipelineStep } from "./services/pipeline/steps";
import { OpenAIOracle } from "./services/translation/openaiOracle";
import { RateLimitedOracle } from "./services/translation/rateLimitedOracle";
import { PageFileNames } from "./utils/url";

export interface PipelineRuntime {
  deps: PipelineDependencies;
  options: PipelineOptions;
  close(): Promise<void>;
}

const createStateStore = async (config: PipelineConfig): Promise<PipelineStateStore> => {
  if (config.state.backend === "mongo") {
    if (!config.state.mongoUri) {
      throw new Error("MONGO_URI is required when STATE_BACKEND=mongo");
    }
    await connectMongo(config.state.mongoUri, config.state.mongoDb);
    return new MongoPipelineStateStore();
  }
  return new FilePipelineStateStore(config.paths.stateFile);
};

/**
 * Post-processors for a step, in the order they run. Asset URLs are resolved
 * before links are localized, so relative links to run pages are caught too.
 */
export const createPostProcessors = (
  config: PipelineConfig,
  fileNames: PageFileNames,
  step: PipelineStep = "all",
): DocumentPostProcessor[] => {
  const { assetUrlResolution, linkLocalization, headerInjection, translatorName } =
    config.postProcessing;
  const processors: DocumentPostProcessor[] = [];
  if (step === "all" || step === "localize") {
    if (assetUrlResolution) processors.push(new AssetUrlResolver());
    if (linkLocalization) processors.push(new LinkLocalizer(fileNames));
  }
  if ((step === "all" || step === "headers") && headerInjection) {
    processors.push(new HeaderInjector({ translatorName }));
  }
  return processors;
};

export interface PageTools {
  fileNames: PageFileNames;
  fetcher: CachedPageFetcher;
  pages: FileDocumentWriter;
}

/** Page fetching and storage, shared by every step; no oracle needed. */
export const createPageTools = (
  config: PipelineConfig,
  urls: readonly string[],
  logger: Logger,
): PageTools => {
  const fileNames = new PageFileNames(urls);
  return {
    fileNames,
    fetcher: new CachedPageFetcher(
      new HttpPageFetcher({ ...config.fetch, logger }),
      config.paths.originDir,
      logger,
      fileNames,
    ),
    pages: new FileDocumentWriter(config.paths.transDir, fileNames),
  };
};

/** Wires the production collaborators for a translating run. */
export async function createRuntime(
  config: PipelineConfig,
  urls: readonly string[],
  logger: Logger,
  step: Extract<PipelineStep, "all" | "translate"> = "all",
): Promise<PipelineRuntime> {
  const client = getOpenAIClient({
    apiKey: config.oracle.apiKey,
    baseURL: config.oracle.baseURL,
    timeoutMs: config.oracle.timeoutMs,
  });
  const oracle = new RateLimitedOracle(
    OpenAIOracle.fromClient(client, {
      model: config.oracle.model,
      maxOutputTokens: config.oracle.maxOutputTokens,
      reasoningEffort: config.oracle.reasoningEffort,
      logger,
    }),
    {
      concurrency: config.oracle.concurrency,
      requestsPerSecond: config.oracle.requestsPerSecond,
    },
  );

  const { fileNames, fetcher, pages } = createPageTools(config, urls, logger);
  const stateStore = await createStateStore(config);

  return {
    deps: {
      fetcher,
      oracle,
      stateStore,
      writer: pages,
      terminology: getTerminology(config.paths.terminologyFile),
      logger,
      postProcessors: step === "all" ? createPostProcessors(config, fileNames) : [],
    },
    options: {
      targetLanguage: config.targetLanguage,
      targetLanguageName: config.targetLanguageName,
      maxChunkChars: config.maxChunkChars,
      chunkConcurrency: config.chunkConcurrency,
      documentConcurrency: config.documentConcurrency,
      retry: config.retry,
      oracleCallBudget: config.oracle.callBudget,
    },
    close: () => stateStore.close(),
  };
}
