import pLimit from "p-limit";

import type { Terminology } from "../../config/terminology";
import {
  CancelledError,
  describeError,
  isPipelineError,
  PipelineError,
  StateStoreError,
  type ErrorDescription,
} from "../errors";
import type { Logger } from "../logger";
import { BLOCK_SEPARATOR, fragment, splitChunkText, type Chunk } from "../document/fragmenter";
import type { PlaceholderStore } from "../document/placeholderStore";
import type { DocumentPostProcessor } from "../document/postProcessors";
import type { ProtectionRule } from "../document/protection";
import { reassemble } from "../document/reassembler";
import {
  segment,
  type DocumentMetadata,
  type SegmentedDocument,
} from "../document/segmenter";
import type { TranslationOracle } from "../translation/oracle";
import type { DocumentWriter } from "./documentWriter";
import { DocumentStateMachine } from "./documentState";
import type { PageFetcher } from "./fetcher";
import { runWithRetry, throwIfCancelled, type RetryPolicy } from "./retry";
import type { PipelineRecord, PipelineStateStore } from "./stateStore";

export interface PipelineDependencies {
  fetcher: PageFetcher;
  oracle: TranslationOracle;
  stateStore: PipelineStateStore;
  writer: DocumentWriter;
  terminology: Terminology;
  logger: Logger;
  postProcessors?: readonly DocumentPostProcessor[];
}

export interface PipelineOptions {
  targetLanguage: string;
  targetLanguageName: string;
  maxChunkChars: number;
  chunkConcurrency: number;
  documentConcurrency: number;
  retry: RetryPolicy;
  /** Translate URLs even when the state store has them as persisted. */
  force?: boolean;
  /** Oracle calls allowed for the whole run; the run is cancelled once spent. */
  oracleCallBudget?: number;
  protectionRules?: readonly ProtectionRule[];
  signal?: AbortSignal;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface DocumentFailure extends ErrorDescription {
  url: string;
}

export interface RunSummary {
  total: number;
  persisted: string[];
  skipped: string[];
  failed: DocumentFailure[];
  cancelled: string[];
  oracleCalls: number;
  durationMs: number;
}

type DocumentOutcome =
  | { kind: "persisted"; outputPath: string }
  | { kind: "skipped" }
  | { kind: "failed"; error: PipelineError }
  | { kind: "cancelled" };

const asPipelineError = (error: unknown): PipelineError =>
  isPipelineError(error)
    ? error
    : new PipelineError("unexpected", error instanceof Error ? error.message : String(error), {
        cause: error,
      });

/** First failure that is not a side effect of cancelling sibling work. */
const primaryFailure = (results: PromiseSettledResult<unknown>[]): unknown => {
  const failures = results.flatMap((result) =>
    result.status === "rejected" ? [result.reason] : [],
  );
  if (!failures.length) return null;
  return failures.find((error) => !(error instanceof CancelledError)) ?? failures[0];
};

class PipelineRun {
  private readonly controller = new AbortController();
  private readonly abortRun = () => this.controller.abort();
  private oracleCalls = 0;

  constructor(
    private readonly deps: PipelineDependencies,
    private readonly options: PipelineOptions,
  ) {
    const { signal } = options;
    if (signal?.aborted) {
      this.controller.abort();
    } else {
      signal?.addEventListener("abort", this.abortRun, { once: true });
    }
  }

  /** Detaches the run from the caller's signal. */
  dispose(): void {
    this.options.signal?.removeEventListener("abort", this.abortRun);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get callCount(): number {
    return this.oracleCalls;
  }

  async processDocument(url: string): Promise<DocumentOutcome> {
    const { stateStore, logger } = this.deps;
    const log = logger.child({ url });

    if (this.signal.aborted) {
      return { kind: "cancelled" };
    }

    const machine = new DocumentStateMachine(url, log);
    try {
      if (!this.options.force) {
        const existing = await this.lookup(url);
        if (existing?.status === "persisted") {
          log.info({ outputPath: existing.outputPath }, "already translated, skipping");
          return { kind: "skipped" };
        }
      }
      const outputPath = await this.translateDocument(url, machine, log);
      log.info({ outputPath }, "document translated");
      return { kind: "persisted", outputPath };
    } catch (caught) {
      const error = asPipelineError(caught);
      machine.fail(error);
      if (error instanceof CancelledError) {
        log.warn("document cancelled before completion");
        return { kind: "cancelled" };
      }
      log.error({ err: error, code: error.code, failedIn: machine.status }, "document failed");
      try {
        await stateStore.markFailed(url, describeError(error));
      } catch (recordError) {
        log.error({ err: recordError }, "could not record document failure");
      }
      return { kind: "failed", error };
    }
  }

  private async lookup(url: string): Promise<PipelineRecord | null> {
    try {
      return await this.deps.stateStore.get(url);
    } catch (error) {
      if (error instanceof StateStoreError) throw error;
      throw new StateStoreError(
        `Could not read pipeline state for ${url}: ${describeError(error).message}`,
        error,
      );
    }
  }

  private async translateDocument(
    url: string,
    machine: DocumentStateMachine,
    log: Logger,
  ): Promise<string> {
    const { fetcher, writer, stateStore, postProcessors = [] } = this.deps;
    const { targetLanguage, maxChunkChars, protectionRules } = this.options;

    throwIfCancelled(this.signal);
    const rawHtml = await fetcher.fetch(url);
    machine.advance({ status: "fetched", rawHtml });

    const document = segment(rawHtml, { protectionRules });
    machine.advance({ status: "segmented", document });

    const chunks = Array.from(fragment(document.layout.blocks, maxChunkChars));
    machine.advance({ status: "fragmented", document, chunks });
    log.debug(
      {
        blocks: document.layout.blocks.length,
        chunks: chunks.length,
        protectedZones: document.store.size,
      },
      "document segmented",
    );

    const metadata = await this.translateUnits(document, chunks, machine, log);
    machine.advance({ status: "translated", document, chunks, metadata });

    let html = reassemble({ document, metadata, chunks, targetLanguage });
    machine.advance({ status: "reassembled", html });

    for (const processor of postProcessors) {
      html = processor.process(html, { url, targetLanguage });
    }

    const outputPath = await writer.write(url, html);
    await stateStore.markPersisted(url, outputPath);
    machine.advance({ status: "persisted", outputPath });
    return outputPath;
  }

  /**
   * Translates every chunk plus the metadata unit, filling
   * `chunk.translatedText` in place. Waits for every unit to settle; the first
   * permanent failure stops units that have not started yet.
   */
  private async translateUnits(
    document: SegmentedDocument,
    chunks: Chunk[],
    machine: DocumentStateMachine,
    log: Logger,
  ): Promise<DocumentMetadata | null> {
    const documentController = new AbortController();
    const stopDocument = () => documentController.abort();
    this.signal.addEventListener("abort", stopDocument, { once: true });

    const metadataBlocks = [document.metadata.title, document.metadata.description].filter(
      (value): value is string => value !== null,
    );
    const total = chunks.length + (metadataBlocks.length ? 1 : 0);
    let settled = 0;
    const settle = () => {
      settled += 1;
      machine.advance({ status: "translating", document, chunks, settled, total });
    };

    machine.advance({ status: "translating", document, chunks, settled, total });

    const limit = pLimit(Math.max(1, this.options.chunkConcurrency));
    const guard = <T>(task: () => Promise<T>) =>
      limit(async () => {
        try {
          return await task();
        } catch (error) {
          documentController.abort();
          throw error;
        } finally {
          settle();
        }
      });

    const result: { metadata: DocumentMetadata | null } = { metadata: null };
    const tasks: Promise<unknown>[] = chunks.map((chunk) =>
      guard(async () => {
        const blocks = await this.translateText(
          chunk.sourceText,
          chunk.blockCount,
          document.store,
          documentController.signal,
          log.child({ chunk: chunk.index }),
        );
        chunk.translatedText = blocks.join(BLOCK_SEPARATOR);
      }),
    );
    if (metadataBlocks.length) {
      tasks.push(
        guard(async () => {
          const blocks = await this.translateText(
            metadataBlocks.join(BLOCK_SEPARATOR),
            metadataBlocks.length,
            document.store,
            documentController.signal,
            log.child({ unit: "metadata" }),
          );
          const translated = [...blocks];
          result.metadata = {
            title: document.metadata.title === null ? null : (translated.shift() ?? null),
            description: document.metadata.description === null ? null : (translated.shift() ?? null),
          };
        }),
      );
    }

    try {
      const failure = primaryFailure(await Promise.allSettled(tasks));
      if (failure) {
        throw this.signal.aborted && failure instanceof CancelledError ? new CancelledError() : failure;
      }
    } finally {
      this.signal.removeEventListener("abort", stopDocument);
    }
    return result.metadata;
  }

  private translateText(
    text: string,
    blockCount: number,
    store: PlaceholderStore,
    signal: AbortSignal,
    log: Logger,
  ): Promise<string[]> {
    const { oracle, terminology } = this.deps;
    const { targetLanguage, targetLanguageName, retry, sleep } = this.options;
    const placeholders = store.findTokens(text);

    return runWithRetry(
      async () => {
        this.spendOracleCall();
        const { translatedText } = await oracle.translate({
          chunkText: text,
          terminology,
          targetLanguage,
          targetLanguageName,
          placeholders,
          blockCount,
          signal,
        });
        return splitChunkText(translatedText, blockCount);
      },
      retry,
      {
        signal,
        sleep,
        onRetry: ({ attempt, delayMs, error }) =>
          log.warn(
            { attempt, delayMs, code: describeError(error).code, err: describeError(error).message },
            "retrying oracle call",
          ),
      },
    );
  }

  private spendOracleCall(): void {
    throwIfCancelled(this.signal);
    const budget = this.options.oracleCallBudget;
    if (budget !== undefined && this.oracleCalls >= budget) {
      this.controller.abort();
      throw new CancelledError(`Oracle call budget of ${budget} exhausted`);
    }
    this.oracleCalls += 1;
  }
}

/**
 * Translates every URL in `urls` and persists the results. Document failures
 * are recorded and reported in the summary; they never abort the run.
 */
export async function runPipeline(
  urls: readonly string[],
  deps: PipelineDependencies,
  options: PipelineOptions,
): Promise<RunSummary> {
  const startedAt = Date.now();
  const uniqueUrls = Array.from(new Set(urls));
  const run = new PipelineRun(deps, options);
  const documentLimit = pLimit(Math.max(1, options.documentConcurrency));

  deps.logger.info(
    { documents: uniqueUrls.length, targetLanguage: options.targetLanguage },
    "pipeline run started",
  );

  let outcomes: Array<{ url: string; outcome: DocumentOutcome }>;
  try {
    outcomes = await Promise.all(
      uniqueUrls.map((url) =>
        documentLimit(async () => ({ url, outcome: await run.processDocument(url) })),
      ),
    );
  } finally {
    run.dispose();
  }

  const summary: RunSummary = {
    total: uniqueUrls.length,
    persisted: [],
    skipped: [],
    failed: [],
    cancelled: [],
    oracleCalls: run.callCount,
    durationMs: Date.now() - startedAt,
  };
  for (const { url, outcome } of outcomes) {
    switch (outcome.kind) {
      case "persisted":
        summary.persisted.push(url);
        break;
      case "skipped":
        summary.skipped.push(url);
        break;
      case "failed":
        summary.failed.push({ url, ...describeError(outcome.error) });
        break;
      case "cancelled":
        summary.cancelled.push(url);
        break;
    }
  }

  deps.logger.info(
    {
      total: summary.total,
      persisted: summary.persisted.length,
      skipped: summary.skipped.length,
      failed: summary.failed.length,
      cancelled: summary.cancelled.length,
      oracleCalls: summary.oracleCalls,
      durationMs: summary.durationMs,
    },
    "pipeline run finished",
  );
  return summary;
}
