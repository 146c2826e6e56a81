#!/usr/bin/env node
import { parseArgs } from "node:util";

import { createPageTools, createPostProcessors, createRuntime } from "./bootstrap";
import { loadConfig } from "./config/env";
import { createLogger } from "./services/logger";
import { runPipeline } from "./services/pipeline/orchestrator";
import { fetchOriginals, parseStep, postProcessSavedPages } from "./services/pipeline/steps";
import { loadUrlList, parseUrlList } from "./utils/url";

const USAGE = `Usage: html-book-translator [--urls <file>] [--step <step>] [--force] [url ...]

  -u, --urls <file>  URL list, one per line (default: URLS_FILE or pipeline/config/urls.txt)
  -s, --step <step>  run one stage only:
                       all        fetch, translate and post-process (default)
                       fetch      cache the original pages
                       translate  translate without post-processing
                       localize   resolve asset URLs and local links in saved pages
                       headers    add the translation-info block to saved pages
  -f, --force        translate pages already recorded as done
  -h, --help         show this message`;

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      urls: { type: "string", short: "u" },
      step: { type: "string", short: "s" },
      force: { type: "boolean", short: "f", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const step = parseStep(values.step);
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const urls = positionals.length
    ? parseUrlList(positionals.join("\n"))
    : await loadUrlList(values.urls ?? config.paths.urlsFile);

  if (!urls.length) {
    logger.warn("no URLs to translate");
    return;
  }

  if (step === "fetch") {
    const { fetcher } = createPageTools(config, urls, logger);
    const summary = await fetchOriginals(urls, fetcher, logger, config.documentConcurrency);
    process.exitCode = summary.failed.length ? 1 : 0;
    return;
  }
  if (step === "localize" || step === "headers") {
    const { fileNames, pages } = createPageTools(config, urls, logger);
    const summary = await postProcessSavedPages(
      urls,
      pages,
      createPostProcessors(config, fileNames, step),
      config.targetLanguage,
      logger,
    );
    process.exitCode = summary.failed.length ? 1 : 0;
    return;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    logger.warn("interrupt received; letting in-flight oracle calls finish");
    controller.abort();
  });

  const runtime = await createRuntime(config, urls, logger, step);
  try {
    const summary = await runPipeline(urls, runtime.deps, {
      ...runtime.options,
      force: values.force,
      signal: controller.signal,
    });
    for (const failure of summary.failed) {
      logger.error(failure, "failed document");
    }
    process.exitCode = summary.failed.length || summary.cancelled.length ? 1 : 0;
  } finally {
    await runtime.close();
  }
}

main().catch((error: unknown) => {
  console.error("[PIPELINE] fatal error", error);
  process.exitCode = 1;
});
