export { loadConfig, getConfigPath, resolveSearchConcurrency } from "./config";
export type { StreamScoutConfig, SearchMode } from "./config";
export { createLogger, setLogLevel, redactSensitive } from "./core/logging";
export type { Logger, LogEnvelope, LogLevel } from "./core/logging";
export { createStreamScoutCore } from "./core/bootstrap";
export type { CoreOptions, StreamScoutCore } from "./core/types";
export { findStreams, DEFAULT_EXTRACTION_CONCURRENCY, DEFAULT_MAX_CANDIDATES } from "./pipeline";
export type {
  Candidate,
  DetailsCollaborator,
  MergedStream,
  RankedStream,
  SearchCollaborator,
  StreamDescriptor,
  TitleContext
} from "./pipeline";
export { UpstreamError, isUpstreamError, toUpstreamError } from "./pipeline/errors";
export type { UpstreamErrorCode, UpstreamSource } from "./pipeline/errors";
export { expandQueries } from "./pipeline/queries";
export { runBounded, Semaphore } from "./pipeline/executor";
export { filterCandidates } from "./pipeline/filter";
export { extractStreams } from "./pipeline/extract";
export { rankStreams } from "./pipeline/ranking";
export { createHttpSearchClient } from "./upstream/http-search";
export { BrowserSearchSession } from "./upstream/browser-search";
export { createDetailsClient } from "./upstream/details";
export { TmdbClient } from "./metadata/tmdb-client";
export { formatContentId, parseContentId } from "./metadata/ids";
export type { MediaType, Meta, MetaPreview, MetadataSource } from "./metadata/types";
export { createAddonHandler } from "./addon/handlers";
export { createManifest } from "./addon/manifest";
export { AddonServer } from "./addon/server";
