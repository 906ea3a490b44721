import { chromium, type Browser, type Page } from "playwright-core";
import type { Logger } from "../core/logging";
import { UpstreamError } from "../pipeline/errors";
import { Semaphore } from "../pipeline/executor";
import type { Candidate, SearchCollaborator } from "../pipeline/types";
import { findChromeExecutable } from "./chrome-locator";
import { parseSearchPage } from "./search-results";
import { buildSearchUrl, siteRequestHeaders } from "./site";

export interface BrowserSearchOptions {
  origin: string;
  headless: boolean;
  settleMs: number;
  timeoutMs: number;
  chromePath?: string;
  logger?: Logger;
}

type OpenSession = {
  browser: Browser;
  page: Page;
};

/**
 * Search through one long-lived headless Chromium page. The page is shared by
 * every query of every request, so the session gate admits one navigation at a time.
 */
export class BrowserSearchSession implements SearchCollaborator {
  readonly concurrency = 1;
  private session: Promise<OpenSession> | null = null;
  private readonly gate = new Semaphore(1);

  constructor(private readonly options: BrowserSearchOptions) {}

  search(query: string): Promise<Candidate[]> {
    return this.gate.use(() => this.navigate(query));
  }

  private async navigate(query: string): Promise<Candidate[]> {
    const { page } = await this.open();
    const url = buildSearchUrl(query, this.options.origin);

    const response = await page.goto(url, { waitUntil: "load", timeout: this.options.timeoutMs });
    const status = response?.status() ?? 200;
    if (status >= 400) {
      throw new UpstreamError(status >= 500 ? "upstream" : "unavailable", `Search page returned status ${status}`, {
        source: "search",
        details: { status, url }
      });
    }
    if (this.options.settleMs > 0) {
      await page.waitForTimeout(this.options.settleMs);
    }

    const html = await page.content();
    const result = parseSearchPage(html, this.options.origin);
    if (result.candidates.length === 0) {
      this.options.logger?.debug("search.empty", {
        data: { query, pageTitle: result.pageTitle, bodyLength: html.length }
      });
    }
    return result.candidates;
  }

  async close(): Promise<void> {
    const pending = this.session;
    this.session = null;
    if (!pending) return;
    // A launch that fails has already been reported to the query that started it.
    const opened = await pending.catch((error: unknown) => {
      this.options.logger?.debug("search.browser.launch_abandoned", {
        data: { message: error instanceof Error ? error.message : String(error) }
      });
      return null;
    });
    if (opened) {
      await opened.browser.close();
    }
  }

  private open(): Promise<OpenSession> {
    if (!this.session) {
      this.session = this.launch();
      this.session.catch(() => {
        this.session = null;
      });
    }
    return this.session;
  }

  private async launch(): Promise<OpenSession> {
    const executablePath = await findChromeExecutable(this.options.chromePath);
    if (!executablePath) {
      throw new UpstreamError("unavailable", "No Chrome or Chromium executable found for browser search", {
        source: "search",
        retryable: false
      });
    }

    const browser = await chromium.launch({
      headless: this.options.headless,
      executablePath
    });
    const context = await browser.newContext({
      userAgent: siteRequestHeaders["user-agent"],
      locale: "cs-CZ"
    });
    const page = await context.newPage();
    this.options.logger?.info("search.browser.launched", { data: { executablePath } });
    return { browser, page };
  }
}
