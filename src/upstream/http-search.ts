import type { Logger } from "../core/logging";
import type { Candidate, SearchCollaborator } from "../pipeline/types";
import { fetchPage } from "./fetch-page";
import { parseSearchPage } from "./search-results";
import { buildSearchUrl } from "./site";

export interface HttpSearchOptions {
  origin: string;
  concurrency: number;
  timeoutMs: number;
  logger?: Logger;
}

/** Stateless search over plain HTTP; safe to run several queries at once. */
export const createHttpSearchClient = (options: HttpSearchOptions): SearchCollaborator => {
  return {
    concurrency: Math.max(1, Math.floor(options.concurrency)),
    async search(query: string): Promise<Candidate[]> {
      const url = buildSearchUrl(query, options.origin);
      const html = await fetchPage(url, { source: "search", timeoutMs: options.timeoutMs });
      const page = parseSearchPage(html, options.origin);
      if (page.candidates.length === 0) {
        options.logger?.debug("search.empty", {
          data: { query, pageTitle: page.pageTitle, bodyLength: html.length }
        });
      }
      return page.candidates;
    }
  };
};
