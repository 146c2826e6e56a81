import { readFile } from "node:fs/promises";
import path from "node:path";

import { FetchError, RetryExhaustedError } from "../errors";
import type { Logger } from "../logger";
import { isMissingFileError, writeFileAtomic } from "../../utils/files";
import { PageFileNames } from "../../utils/url";
import { abortableSleep, runWithRetry } from "./retry";

export interface PageFetcher {
  fetch(url: string): Promise<string>;
}

export interface HttpPageFetcherOptions {
  userAgent: string;
  timeoutMs: number;
  maxAttempts: number;
  retryDelayMs: number;
  fetchImpl?: typeof fetch;
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

const isTransientStatus = (status: number): boolean => status === 408 || status === 429 || status >= 500;

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly options: HttpPageFetcherOptions) {}

  async fetch(url: string): Promise<string> {
    const { maxAttempts, retryDelayMs, sleep = abortableSleep, logger } = this.options;
    try {
      return await runWithRetry(() => this.fetchOnce(url), {
        maxAttempts,
        baseDelayMs: retryDelayMs,
        maxDelayMs: retryDelayMs * 8,
      }, {
        sleep: (ms) => sleep(ms),
        onRetry: ({ attempt, delayMs, error }) =>
          logger?.warn(
            { url, attempt, delayMs, err: error instanceof Error ? error.message : String(error) },
            "retrying page fetch",
          ),
      });
    } catch (error) {
      if (error instanceof RetryExhaustedError) {
        throw new FetchError(url, error.message, { cause: error });
      }
      throw error;
    }
  }

  private async fetchOnce(url: string): Promise<string> {
    const fetchImpl = this.options.fetchImpl ?? fetch;
    let response: Response;
    try {
      response = await fetchImpl(url, {
        headers: {
          "User-Agent": this.options.userAgent,
          Accept: "text/html,application/xhtml+xml",
        },
        redirect: "follow",
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(url, message, { retryable: true, cause: error });
    }

    if (!response.ok) {
      throw new FetchError(url, `HTTP ${response.status}`, {
        status: response.status,
        retryable: isTransientStatus(response.status),
      });
    }
    return response.text();
  }
}

/**
 * Keeps a copy of every fetched page under `originDir` and serves later
 * requests for the same URL from it.
 */
export class CachedPageFetcher implements PageFetcher {
  constructor(
    private readonly inner: PageFetcher,
    private readonly originDir: string,
    private readonly logger?: Logger,
    private readonly fileNames = new PageFileNames(),
  ) {}

  async fetch(url: string): Promise<string> {
    const filePath = path.join(this.originDir, this.fileNames.resolve(url));
    try {
      const cached = await readFile(filePath, "utf8");
      this.logger?.debug({ url, filePath }, "using cached original");
      return cached;
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }

    const html = await this.inner.fetch(url);
    await writeFileAtomic(filePath, html);
    this.logger?.debug({ url, filePath }, "saved original");
    return html;
  }
}
