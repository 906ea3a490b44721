import * as cheerio from "cheerio";
import type { Candidate } from "../pipeline/types";
import { resolveAddress } from "./site";

export interface SearchAnchor {
  href?: string;
  text: string;
  titleAttribute?: string;
}

export interface SearchPage {
  candidates: Candidate[];
  pageTitle: string;
  usedFallback: boolean;
}

const RESULT_SELECTOR = "a.video--link";
const NAVIGATION_PREFIXES = ["/hledej", "/profil", "/cenik"];
const SIZE_UNITS = ["MB", "GB", "kB"];

const isDurationLine = (line: string): boolean => line.includes(":") && line.length < 10;
const isSizeLine = (line: string): boolean => SIZE_UNITS.some((unit) => line.includes(unit));

/**
 * Reads one result anchor. Its text carries the duration, the size and the
 * title on separate lines; the last line that is neither is the title.
 */
export const parseSearchAnchor = (anchor: SearchAnchor, origin: string): Candidate | null => {
  if (!anchor.href) return null;

  let duration = "";
  let size = "";
  let title = "";
  for (const rawLine of anchor.text.split("\n")) {
    const line = rawLine.trim();
    if (!line) continue;
    if (isDurationLine(line)) {
      duration = line;
    } else if (isSizeLine(line)) {
      size = line;
    } else {
      title = line;
    }
  }

  if (!title && (size || duration)) {
    title = anchor.titleAttribute ?? anchor.text.trim();
  }
  if (!title) return null;

  const address = resolveAddress(anchor.href, origin);
  if (!address) return null;

  return { title, duration, size, address };
};

const looksLikeResult = (anchor: SearchAnchor): boolean => {
  const href = anchor.href ?? "";
  if (NAVIGATION_PREFIXES.some((prefix) => href.startsWith(prefix))) return false;
  return (anchor.text.includes("MB") || anchor.text.includes("GB")) && anchor.text.includes(":");
};

export const parseSearchPage = (html: string, origin: string): SearchPage => {
  const $ = cheerio.load(html);
  const readAnchors = (selector: string): SearchAnchor[] => {
    return $(selector)
      .toArray()
      .map((element) => {
        const link = $(element);
        return {
          href: link.attr("href"),
          text: link.text(),
          titleAttribute: link.attr("title")
        };
      });
  };

  const collect = (anchors: SearchAnchor[]): Candidate[] => {
    const candidates: Candidate[] = [];
    for (const anchor of anchors) {
      const candidate = parseSearchAnchor(anchor, origin);
      if (candidate) candidates.push(candidate);
    }
    return candidates;
  };

  const pageTitle = $("title").first().text().trim();
  const primary = collect(readAnchors(RESULT_SELECTOR));
  if (primary.length > 0) {
    return { candidates: primary, pageTitle, usedFallback: false };
  }

  const fallback = collect(readAnchors("a[href]").filter(looksLikeResult));
  return { candidates: fallback, pageTitle, usedFallback: true };
};
