import { createLogger, createRequestId, type Logger } from "../core/logging";
import { toUpstreamError } from "./errors";
import { runBounded } from "./executor";
import { filterCandidates } from "./filter";
import { expandQueries } from "./queries";
import { mergeWithCandidate, rankStreams } from "./ranking";
import type {
  Candidate,
  DetailsCollaborator,
  MergedStream,
  RankedStream,
  SearchCollaborator,
  TitleContext
} from "./types";

export const DEFAULT_EXTRACTION_CONCURRENCY = 5;
export const DEFAULT_MAX_CANDIDATES = 25;

export interface StreamPipelineOptions {
  search: SearchCollaborator;
  details: DetailsCollaborator;
  extractionConcurrency?: number;
  maxCandidates?: number;
  logger?: Logger;
  requestId?: string;
}

const defaultLogger = createLogger("pipeline");

/**
 * Finds and ranks playable streams for one title. Failed searches and pages
 * without sources contribute nothing; the returned list may be empty.
 */
export const findStreams = async (
  context: TitleContext,
  options: StreamPipelineOptions
): Promise<RankedStream[]> => {
  const logger = options.logger ?? defaultLogger;
  const requestId = options.requestId ?? createRequestId();
  const queries = expandQueries(context);

  if (queries.length === 0) {
    logger.warn("pipeline.no_queries", { requestId, data: { name: context.name } });
    return [];
  }
  logger.info("pipeline.search.start", { requestId, data: { queries } });

  const searchRun = await runBounded<string, Candidate>({
    items: queries,
    concurrency: options.search.concurrency,
    operation: (query) => options.search.search(query),
    onFailure: (query, error) => {
      const failure = toUpstreamError(error, { source: "search" });
      logger.warn("pipeline.search.failed", {
        requestId,
        data: { query, code: failure.code, message: failure.message }
      });
    }
  });

  const report = filterCandidates(searchRun.results, context);
  const maxCandidates = Math.max(1, options.maxCandidates ?? DEFAULT_MAX_CANDIDATES);
  const selected = report.candidates.slice(0, maxCandidates);
  logger.info("pipeline.candidates", {
    requestId,
    data: {
      found: searchRun.results.length,
      unique: report.candidates.length,
      selected: selected.length,
      rejectedByYear: report.rejectedByYear,
      duplicates: report.duplicates,
      unmatchedTitles: report.unmatchedTitles,
      failedQueries: searchRun.failed
    }
  });

  const extractionRun = await runBounded<Candidate, MergedStream>({
    items: selected,
    concurrency: options.extractionConcurrency ?? DEFAULT_EXTRACTION_CONCURRENCY,
    operation: async (candidate) => {
      const streams = await options.details.fetchDetails(candidate.address);
      return streams.map((stream) => mergeWithCandidate(stream, candidate));
    },
    onFailure: (candidate, error) => {
      const failure = toUpstreamError(error, { source: "details" });
      logger.warn("pipeline.extract.failed", {
        requestId,
        data: { address: candidate.address, code: failure.code, message: failure.message }
      });
    }
  });

  const ranked = rankStreams(extractionRun.results, context.year);
  logger.info("pipeline.done", {
    requestId,
    data: { streams: ranked.length, failedPages: extractionRun.failed }
  });
  return ranked;
};

export type {
  Candidate,
  DetailsCollaborator,
  MergedStream,
  RankedStream,
  SearchCollaborator,
  StreamDescriptor,
  TitleContext
} from "./types";
