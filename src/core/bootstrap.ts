import type { StreamScoutConfig } from "../config";
import { TmdbClient } from "../metadata/tmdb-client";
import type { MetadataSource } from "../metadata/types";
import { findStreams } from "../pipeline";
import type { SearchCollaborator } from "../pipeline/types";
import { BrowserSearchSession } from "../upstream/browser-search";
import { createDetailsClient } from "../upstream/details";
import { createHttpSearchClient } from "../upstream/http-search";
import { createLogger, setLogLevel } from "./logging";
import type { CoreOptions, StreamScoutCore } from "./types";

type ClosableSearch = SearchCollaborator & { close?: () => Promise<void> };

const createSearch = (config: StreamScoutConfig): ClosableSearch => {
  const logger = createLogger("search");
  if (config.search.mode === "http") {
    return createHttpSearchClient({
      origin: config.site.origin,
      concurrency: config.search.concurrency,
      timeoutMs: config.search.timeoutMs,
      logger
    });
  }
  return new BrowserSearchSession({
    origin: config.site.origin,
    headless: config.search.headless,
    settleMs: config.search.settleMs,
    timeoutMs: config.search.timeoutMs,
    ...(config.search.chromePath ? { chromePath: config.search.chromePath } : {}),
    logger
  });
};

const createMetadata = (config: StreamScoutConfig): MetadataSource | null => {
  if (!config.tmdb.apiKey) {
    createLogger("core").warn("core.tmdb.disabled", { data: { reason: "missing TMDB_API_KEY" } });
    return null;
  }
  return new TmdbClient({
    apiKey: config.tmdb.apiKey,
    language: config.tmdb.language,
    timeoutMs: config.tmdb.timeoutMs,
    concurrency: config.tmdb.concurrency,
    logger: createLogger("tmdb")
  });
};

export function createStreamScoutCore(options: CoreOptions): StreamScoutCore {
  const { config } = options;
  setLogLevel(config.logLevel);

  const search = options.search ?? createSearch(config);
  const details = options.details ?? createDetailsClient({ timeoutMs: config.extraction.timeoutMs });
  const metadata = options.metadata === undefined ? createMetadata(config) : options.metadata;
  const pipelineLogger = createLogger("pipeline");

  return {
    config,
    search,
    details,
    metadata,
    findStreams: (context, requestId) => findStreams(context, {
      search,
      details,
      extractionConcurrency: config.extraction.concurrency,
      maxCandidates: config.extraction.maxCandidates,
      logger: pipelineLogger,
      ...(requestId ? { requestId } : {})
    }),
    cleanup: async () => {
      await search.close?.();
    }
  };
}
