import { afterEach, describe, expect, it, vi } from "vitest";
import { fetchPage } from "../src/upstream/fetch-page";
import { createHttpSearchClient } from "../src/upstream/http-search";
import { createDetailsClient } from "../src/upstream/details";
import { createLogger, setLogLevel, type LogEnvelope } from "../src/core/logging";
import { isUpstreamError, type UpstreamError } from "../src/pipeline/errors";

const stubFetch = (impl: (url: string, init?: RequestInit) => Promise<Response>) => {
  const fetchMock = vi.fn(impl);
  vi.stubGlobal("fetch", fetchMock);
  return fetchMock;
};

const rejection = async (promise: Promise<unknown>): Promise<UpstreamError> => {
  try {
    await promise;
  } catch (error) {
    if (isUpstreamError(error)) return error;
    throw error;
  }
  throw new Error("expected rejection");
};

afterEach(() => {
  vi.unstubAllGlobals();
  vi.unstubAllEnvs();
  setLogLevel("info");
});

describe("fetchPage", () => {
  it("returns the body and sends the site headers", async () => {
    const fetchMock = stubFetch(async () => new Response("<html>ok</html>", { status: 200 }));

    const html = await fetchPage("https://prehraj.to/video/1", { source: "details", timeoutMs: 1000 });

    expect(html).toBe("<html>ok</html>");
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.redirect).toBe("follow");
    expect(init?.headers).toMatchObject({ "accept-language": "cs-CZ,cs;q=0.9,sk;q=0.8,en;q=0.7" });
  });

  it("keeps the site headers fixed regardless of the environment", async () => {
    vi.stubEnv("STREAMSCOUT_ACCEPT_LANGUAGE", "en-US");
    vi.stubEnv("STREAMSCOUT_USER_AGENT", "custom-agent");
    vi.resetModules();
    const fresh = await import("../src/upstream/fetch-page");
    const fetchMock = stubFetch(async () => new Response("<html>ok</html>", { status: 200 }));

    await fresh.fetchPage("https://prehraj.to/video/1", { source: "details", timeoutMs: 1000 });

    const headers = fetchMock.mock.calls[0]?.[1]?.headers;
    expect(headers).toMatchObject({
      "user-agent": expect.stringMatching(/^Mozilla\/5\.0 \(Windows NT 10\.0/),
      "accept-language": "cs-CZ,cs;q=0.9,sk;q=0.8,en;q=0.7"
    });
  });

  it("rejects non-http addresses without fetching", async () => {
    const fetchMock = stubFetch(async () => new Response(""));

    const error = await rejection(fetchPage("ftp://prehraj.to/file", { source: "details", timeoutMs: 1000 }));

    expect(error.code).toBe("invalid_input");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("maps aborted requests to timeout", async () => {
    stubFetch(async () => {
      throw Object.assign(new Error("The operation was aborted due to timeout"), { name: "TimeoutError" });
    });

    const error = await rejection(fetchPage("https://prehraj.to/a", { source: "search", timeoutMs: 10 }));

    expect(error.code).toBe("timeout");
    expect(error.source).toBe("search");
    expect(error.message).toBe("Timed out retrieving https://prehraj.to/a");
  });

  it("maps thrown failures to network", async () => {
    stubFetch(async () => {
      throw new TypeError("fetch failed");
    });

    const error = await rejection(fetchPage("https://prehraj.to/a", { source: "search", timeoutMs: 1000 }));

    expect(error.code).toBe("network");
    expect(error.retryable).toBe(true);
  });

  it("maps error statuses", async () => {
    stubFetch(async (url) => new Response("", { status: url.endsWith("/missing") ? 404 : 503 }));

    expect((await rejection(fetchPage("https://prehraj.to/missing", { source: "details", timeoutMs: 1000 }))).code).toBe("unavailable");
    expect((await rejection(fetchPage("https://prehraj.to/broken", { source: "details", timeoutMs: 1000 }))).code).toBe("upstream");
  });
});

describe("http search client", () => {
  it("fetches the search page and parses candidates", async () => {
    const fetchMock = stubFetch(async () => new Response(
      `<a class="video--link" href="/wicked/1">\n2:40:00\n2.1 GB\nWicked 2024\n</a>`,
      { status: 200 }
    ));
    const client = createHttpSearchClient({ origin: "https://prehraj.to", concurrency: 4.8, timeoutMs: 1000 });

    const candidates = await client.search("Wicked 2024");

    expect(client.concurrency).toBe(4);
    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://prehraj.to/hledej/Wicked%202024");
    expect(candidates).toEqual([
      { title: "Wicked 2024", duration: "2:40:00", size: "2.1 GB", address: "https://prehraj.to/wicked/1" }
    ]);
  });

  it("logs empty result pages at debug level", async () => {
    stubFetch(async () => new Response("<html><head><title>Prehraj.to</title></head></html>", { status: 200 }));
    const entries: LogEnvelope[] = [];
    setLogLevel("debug");
    const client = createHttpSearchClient({
      origin: "https://prehraj.to",
      concurrency: 2,
      timeoutMs: 1000,
      logger: createLogger("search", (entry) => entries.push(entry))
    });

    expect(await client.search("Nothing")).toEqual([]);
    expect(entries[0]?.event).toBe("search.empty");
    expect(entries[0]?.data).toMatchObject({ query: "Nothing", pageTitle: "Prehraj.to" });
  });
});

describe("details client", () => {
  it("extracts streams from the detail page", async () => {
    stubFetch(async () => new Response(
      `<script>var sources = [{file: "https://cdn.example.test/1.mp4", label: "1080p"}];</script>`,
      { status: 200 }
    ));

    const streams = await createDetailsClient({ timeoutMs: 1000 }).fetchDetails("https://prehraj.to/video/1");

    expect(streams).toEqual([{ label: "1080p", address: "https://cdn.example.test/1.mp4" }]);
  });

  it("fails with no_sources when the page has none", async () => {
    stubFetch(async () => new Response("<html></html>", { status: 200 }));

    const error = await rejection(createDetailsClient({ timeoutMs: 1000 }).fetchDetails("https://prehraj.to/video/2"));

    expect(error.code).toBe("no_sources");
    expect(error.retryable).toBe(false);
    expect(error.message).toBe("No playable sources found at https://prehraj.to/video/2");
  });
});
