import type { StreamDescriptor } from "./types";

export const RESOLUTION_MARKER = "Rozlišení:";
export const UNKNOWN_LABEL = "Unknown";

const SOURCES_RE = /var sources = (\[[\s\S]*?\]);/;
const FILE_RE = /file:\s*["']([^"']+)["']/;
const LABEL_RE = /label:\s*["']([^"']+)["']/;
// An item ends at its closing tag, the next item or the end of the list; `</li>` is optional in HTML.
const LIST_ITEM_RE = /<li\b[^>]*>([\s\S]*?)(?=<li\b|<\/li>|<\/[uo]l>|$)/gi;
const SPAN_RE = /<span\b[^>]*>([\s\S]*?)<\/span>/gi;
const TAG_RE = /<[^>]+>/g;
const SPACE_RE = /\s+/g;

const stripTags = (html: string): string => {
  return html
    .replace(TAG_RE, " ")
    .replace(/&nbsp;/g, " ")
    .replace(SPACE_RE, " ")
    .trim();
};

export const findSourcesLiteral = (html: string): string | null => {
  return SOURCES_RE.exec(html)?.[1] ?? null;
};

export const parseSourceEntries = (literal: string): Array<{ file: string; label: string }> => {
  const entries: Array<{ file: string; label: string }> = [];
  for (const segment of literal.split("{")) {
    if (!segment.includes("file:")) continue;
    const file = FILE_RE.exec(segment)?.[1];
    if (!file) continue;
    entries.push({
      file,
      label: LABEL_RE.exec(segment)?.[1] ?? UNKNOWN_LABEL
    });
  }
  return entries;
};

/** Text of the first `<span>` beside the resolution marker in the first list item that carries it. */
export const findResolutionHint = (html: string): string | undefined => {
  for (const item of html.matchAll(LIST_ITEM_RE)) {
    const inner = item[1] ?? "";
    const text = stripTags(inner);
    if (!text.includes(RESOLUTION_MARKER)) continue;

    for (const span of inner.matchAll(SPAN_RE)) {
      const value = stripTags(span[1] ?? "");
      if (value && !value.includes(RESOLUTION_MARKER)) {
        return value;
      }
    }
    const rest = text.slice(text.indexOf(RESOLUTION_MARKER) + RESOLUTION_MARKER.length).trim();
    return rest || undefined;
  }
  return undefined;
};

export const extractStreams = (html: string): StreamDescriptor[] => {
  const literal = findSourcesLiteral(html);
  if (!literal) return [];

  const entries = parseSourceEntries(literal);
  if (entries.length === 0) return [];

  const hint = findResolutionHint(html);
  return entries.map((entry) => ({
    label: entry.label,
    address: entry.file,
    ...(hint ? { sourceResolutionHint: hint } : {})
  }));
};
