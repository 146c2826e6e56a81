import pLimit from "p-limit";
import { z } from "zod";

import { describeError } from "../errors";
import type { Logger } from "../logger";
import type { DocumentPostProcessor } from "../document/postProcessors";
import type { TranslatedPages } from "./documentWriter";
import type { PageFetcher } from "./fetcher";
import type { DocumentFailure } from "./orchestrator";

export const PIPELINE_STEPS = ["all", "fetch", "translate", "localize", "headers"] as const;

/**
 * - `all`: fetch, translate and post-process every page
 * - `fetch`: cache the original pages only
 * - `translate`: translate without post-processing
 * - `localize`: resolve asset URLs and local links in saved translations
 * - `headers`: add the translation-info block to saved translations
 */
export type PipelineStep = (typeof PIPELINE_STEPS)[number];

const stepSchema = z.enum(PIPELINE_STEPS);

export const parseStep = (value: string | undefined): PipelineStep => {
  const parsed = stepSchema.safeParse(value ?? "all");
  if (!parsed.success) {
    throw new Error(`Unknown step "${value}"; expected one of ${PIPELINE_STEPS.join(", ")}`);
  }
  return parsed.data;
};

export interface FetchStepSummary {
  fetched: string[];
  failed: DocumentFailure[];
}

/** Fetches (and so caches) every page without translating anything. */
export async function fetchOriginals(
  urls: readonly string[],
  fetcher: PageFetcher,
  logger: Logger,
  concurrency = 1,
): Promise<FetchStepSummary> {
  const limit = pLimit(Math.max(1, concurrency));
  const summary: FetchStepSummary = { fetched: [], failed: [] };
  const failures = await Promise.all(
    urls.map((url) =>
      limit(async (): Promise<DocumentFailure | null> => {
        try {
          await fetcher.fetch(url);
          return null;
        } catch (error) {
          logger.error({ url, err: error }, "page fetch failed");
          return { url, ...describeError(error) };
        }
      }),
    ),
  );
  urls.forEach((url, index) => {
    const failure = failures[index];
    if (failure) {
      summary.failed.push(failure);
    } else {
      summary.fetched.push(url);
    }
  });
  logger.info(
    { fetched: summary.fetched.length, failed: summary.failed.length },
    "fetch step finished",
  );
  return summary;
}

export interface PostProcessStepSummary {
  updated: string[];
  unchanged: string[];
  missing: string[];
  failed: DocumentFailure[];
}

/**
 * Runs `processors` over translations already on disk, without the oracle.
 * Pages that were never translated are reported as missing.
 */
export async function postProcessSavedPages(
  urls: readonly string[],
  pages: TranslatedPages,
  processors: readonly DocumentPostProcessor[],
  targetLanguage: string,
  logger: Logger,
): Promise<PostProcessStepSummary> {
  const summary: PostProcessStepSummary = { updated: [], unchanged: [], missing: [], failed: [] };
  for (const url of urls) {
    try {
      const html = await pages.read(url);
      if (html === null) {
        logger.warn({ url }, "no saved translation to post-process");
        summary.missing.push(url);
        continue;
      }
      const processed = processors.reduce(
        (current, processor) => processor.process(current, { url, targetLanguage }),
        html,
      );
      if (processed === html) {
        summary.unchanged.push(url);
        continue;
      }
      await pages.write(url, processed);
      summary.updated.push(url);
    } catch (error) {
      logger.error({ url, err: error }, "post-processing failed");
      summary.failed.push({ url, ...describeError(error) });
    }
  }
  logger.info(
    {
      updated: summary.updated.length,
      unchanged: summary.unchanged.length,
      missing: summary.missing.length,
      failed: summary.failed.length,
    },
    "post-processing step finished",
  );
  return summary;
}
