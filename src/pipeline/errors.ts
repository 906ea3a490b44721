export type UpstreamErrorCode =
  | "network"
  | "timeout"
  | "rate_limited"
  | "auth"
  | "upstream"
  | "unavailable"
  | "no_sources"
  | "invalid_input"
  | "internal";

export type UpstreamSource = "search" | "details" | "metadata";

export type UpstreamErrorDetails = Record<string, string | number | boolean | null>;

const NETWORK_MESSAGE_RE = /(ECONNRESET|ECONNREFUSED|EAI_AGAIN|ENOTFOUND|socket hang up|fetch failed|network)/i;
const RATE_LIMIT_RE = /(rate limit|too many requests|429)/i;
const AUTH_RE = /(unauthorized|forbidden|401|403)/i;
const TIMEOUT_RE = /(timeout|timed out|abort)/i;

export const isRetryableByCode = (code: UpstreamErrorCode): boolean => {
  return code === "timeout"
    || code === "network"
    || code === "rate_limited"
    || code === "upstream";
};

export class UpstreamError extends Error {
  readonly code: UpstreamErrorCode;
  readonly retryable: boolean;
  readonly source?: UpstreamSource;
  readonly details?: UpstreamErrorDetails;

  constructor(
    code: UpstreamErrorCode,
    message: string,
    options: {
      retryable?: boolean;
      source?: UpstreamSource;
      details?: UpstreamErrorDetails;
      cause?: unknown;
    } = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "UpstreamError";
    this.code = code;
    this.retryable = options.retryable ?? isRetryableByCode(code);
    this.source = options.source;
    this.details = options.details;
  }
}

export const isUpstreamError = (value: unknown): value is UpstreamError => {
  return value instanceof UpstreamError;
};

const classifyErrorCode = (message: string, fallback: UpstreamErrorCode): UpstreamErrorCode => {
  if (!message) return fallback;
  if (TIMEOUT_RE.test(message)) return "timeout";
  if (RATE_LIMIT_RE.test(message)) return "rate_limited";
  if (AUTH_RE.test(message)) return "auth";
  if (NETWORK_MESSAGE_RE.test(message)) return "network";
  return fallback;
};

export const toUpstreamError = (
  error: unknown,
  options: { source?: UpstreamSource; defaultCode?: UpstreamErrorCode } = {}
): UpstreamError => {
  if (isUpstreamError(error)) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  const code = classifyErrorCode(message, options.defaultCode ?? "internal");
  return new UpstreamError(code, message || "Unknown upstream failure", {
    source: options.source,
    cause: error
  });
};

export const errorFromStatus = (
  status: number,
  url: string,
  source: UpstreamSource
): UpstreamError | null => {
  const details = { status, url };
  if (status === 401 || status === 403) {
    return new UpstreamError("auth", `Authentication required for ${url}`, { source, details, retryable: false });
  }
  if (status === 429) {
    return new UpstreamError("rate_limited", `Rate limited while retrieving ${url}`, { source, details });
  }
  if (status >= 500) {
    return new UpstreamError("upstream", `Upstream failed while retrieving ${url} (status ${status})`, { source, details });
  }
  if (status >= 400) {
    return new UpstreamError("unavailable", `Retrieval failed for ${url} (status ${status})`, { source, details });
  }
  return null;
};
