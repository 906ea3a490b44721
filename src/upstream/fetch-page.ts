import { errorFromStatus, UpstreamError, type UpstreamSource } from "../pipeline/errors";
import { siteRequestHeaders } from "./site";

export interface FetchPageOptions {
  source: UpstreamSource;
  timeoutMs: number;
  headers?: Record<string, string>;
}

const isHttpUrl = (value: string): boolean => {
  try {
    const protocol = new URL(value).protocol;
    return protocol === "http:" || protocol === "https:";
  } catch {
    return false;
  }
};

export const fetchPage = async (url: string, options: FetchPageOptions): Promise<string> => {
  if (!isHttpUrl(url)) {
    throw new UpstreamError("invalid_input", "Retrieval URL must be an HTTP(S) URL", {
      source: options.source,
      retryable: false,
      details: { url }
    });
  }

  let response: Response;
  try {
    response = await fetch(url, {
      headers: { ...siteRequestHeaders, ...(options.headers ?? {}) },
      redirect: "follow",
      signal: AbortSignal.timeout(options.timeoutMs)
    });
  } catch (error) {
    const message = error instanceof Error ? `${error.name} ${error.message}` : String(error);
    if (/abort|timeout/i.test(message)) {
      throw new UpstreamError("timeout", `Timed out retrieving ${url}`, {
        source: options.source,
        cause: error
      });
    }
    throw new UpstreamError("network", `Failed to retrieve ${url}`, {
      source: options.source,
      cause: error
    });
  }

  const statusError = errorFromStatus(response.status, url, options.source);
  if (statusError) {
    throw statusError;
  }
  return response.text();
};
