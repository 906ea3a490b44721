import { beforeEach, describe, expect, it, vi } from "vitest";

const mocks = vi.hoisted(() => {
  const page = {
    goto: vi.fn(),
    waitForTimeout: vi.fn(async () => undefined),
    content: vi.fn(async () => "")
  };
  const context = { newPage: vi.fn(async () => page) };
  const browser = {
    newContext: vi.fn(async () => context),
    close: vi.fn(async () => undefined)
  };
  return {
    page,
    context,
    browser,
    launch: vi.fn(async () => browser),
    findChrome: vi.fn(async (): Promise<string | null> => "/usr/bin/chromium")
  };
});

vi.mock("playwright-core", () => ({
  chromium: { launch: mocks.launch }
}));

vi.mock("../src/upstream/chrome-locator", () => ({
  findChromeExecutable: mocks.findChrome
}));

import { BrowserSearchSession } from "../src/upstream/browser-search";
import { isUpstreamError } from "../src/pipeline/errors";

const RESULTS = `<a class="video--link" href="/wicked/1">\n2:40:00\n2.1 GB\nWicked 2024\n</a>`;

const okResponse = (status = 200) => ({ status: () => status });

const createSession = (settleMs = 250) => new BrowserSearchSession({
  origin: "https://prehraj.to",
  headless: true,
  settleMs,
  timeoutMs: 5000,
  chromePath: "/opt/chrome"
});

beforeEach(() => {
  vi.clearAllMocks();
  mocks.findChrome.mockResolvedValue("/usr/bin/chromium");
  mocks.page.goto.mockResolvedValue(okResponse());
  mocks.page.content.mockResolvedValue(RESULTS);
});

describe("BrowserSearchSession", () => {
  it("launches once and reuses the page for every query", async () => {
    const session = createSession();

    const first = await session.search("Wicked");
    await session.search("Wicked 2024");

    expect(session.concurrency).toBe(1);
    expect(mocks.findChrome).toHaveBeenCalledWith("/opt/chrome");
    expect(mocks.launch).toHaveBeenCalledTimes(1);
    expect(mocks.launch).toHaveBeenCalledWith({ headless: true, executablePath: "/usr/bin/chromium" });
    expect(mocks.context.newPage).toHaveBeenCalledTimes(1);
    expect(mocks.page.goto).toHaveBeenNthCalledWith(1, "https://prehraj.to/hledej/Wicked", { waitUntil: "load", timeout: 5000 });
    expect(mocks.page.goto).toHaveBeenNthCalledWith(2, "https://prehraj.to/hledej/Wicked%202024", { waitUntil: "load", timeout: 5000 });
    expect(mocks.page.waitForTimeout).toHaveBeenCalledWith(250);
    expect(first).toEqual([
      { title: "Wicked 2024", duration: "2:40:00", size: "2.1 GB", address: "https://prehraj.to/wicked/1" }
    ]);
  });

  it("skips the settle delay when it is zero", async () => {
    await createSession(0).search("Wicked");
    expect(mocks.page.waitForTimeout).not.toHaveBeenCalled();
  });

  it("maps error statuses", async () => {
    const session = createSession();

    mocks.page.goto.mockResolvedValueOnce(okResponse(503));
    await expect(session.search("Wicked")).rejects.toMatchObject({ code: "upstream", source: "search" });

    mocks.page.goto.mockResolvedValueOnce(okResponse(404));
    await expect(session.search("Wicked")).rejects.toMatchObject({ code: "unavailable" });
  });

  it("fails as unavailable without a browser and retries the launch later", async () => {
    const session = createSession();
    mocks.findChrome.mockResolvedValueOnce(null);

    const failure = await session.search("Wicked").then(() => null, (error: unknown) => error);
    expect(isUpstreamError(failure) && failure.code).toBe("unavailable");
    expect(isUpstreamError(failure) && failure.retryable).toBe(false);
    expect(mocks.launch).not.toHaveBeenCalled();

    await session.search("Wicked");
    expect(mocks.findChrome).toHaveBeenCalledTimes(2);
    expect(mocks.launch).toHaveBeenCalledTimes(1);
  });

  it("runs one navigation at a time across concurrent callers", async () => {
    const session = createSession(0);
    const pages: Record<string, string> = {
      "https://prehraj.to/hledej/Wicked": RESULTS,
      "https://prehraj.to/hledej/Dune": `<a class="video--link" href="/dune/1">\n2:35:00\n3.0 GB\nDune 2021\n</a>`
    };
    let current = "";
    let active = 0;
    let peak = 0;
    mocks.page.goto.mockImplementation(async (url: string) => {
      active += 1;
      peak = Math.max(peak, active);
      current = url;
      await new Promise((resolve) => setTimeout(resolve, 5));
      active -= 1;
      return okResponse();
    });
    mocks.page.content.mockImplementation(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return pages[current] ?? "";
    });

    const [wicked, dune] = await Promise.all([session.search("Wicked"), session.search("Dune")]);

    expect(peak).toBe(1);
    expect(wicked.map((candidate) => candidate.title)).toEqual(["Wicked 2024"]);
    expect(dune.map((candidate) => candidate.title)).toEqual(["Dune 2021"]);
  });

  it("closes cleanly while a failing launch is still starting", async () => {
    const session = createSession();
    mocks.launch.mockImplementationOnce(async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      throw new Error("spawn failed");
    });

    const searching = session.search("Wicked").then(() => null, (error: unknown) => error);
    await vi.waitFor(() => expect(mocks.launch).toHaveBeenCalledTimes(1));

    await expect(session.close()).resolves.toBeUndefined();
    const failure = await searching;
    expect(failure instanceof Error && failure.message).toBe("spawn failed");
    expect(mocks.browser.close).not.toHaveBeenCalled();
  });

  it("closes the browser once opened", async () => {
    const session = createSession();
    await session.close();
    expect(mocks.browser.close).not.toHaveBeenCalled();

    await session.search("Wicked");
    await session.close();
    expect(mocks.browser.close).toHaveBeenCalledTimes(1);
  });
});
