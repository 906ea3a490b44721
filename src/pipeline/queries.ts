import { normalizeTitle } from "./normalize";
import type { TitleContext } from "./types";

const pad2 = (value: number): string => String(value).padStart(2, "0");

export const episodeSuffix = (context: Pick<TitleContext, "season" | "episode">): string => {
  if (typeof context.season !== "number" || typeof context.episode !== "number") {
    return "";
  }
  return ` S${pad2(context.season)}E${pad2(context.episode)}`;
};

export const nameVariants = (name: string): string[] => {
  if (!name.trim()) return [];

  const variants = [name];
  const normalized = normalizeTitle(name);
  if (normalized !== name) {
    variants.push(normalized);
  }
  if (name.includes(":")) {
    const spaced = name.replaceAll(":", " ");
    if (!variants.includes(spaced)) {
      variants.push(spaced);
    }
  }
  return variants;
};

export const searchNames = (context: Pick<TitleContext, "name" | "originalName">): string[] => {
  const names = [context.name];
  if (context.originalName && context.originalName !== context.name) {
    names.push(context.originalName);
  }
  return names.filter((name) => name.trim().length > 0);
};

/**
 * Builds the ordered query list for one title: every name variant, bare and
 * with the release year, each carrying the episode suffix for series.
 */
export const expandQueries = (context: TitleContext): string[] => {
  const suffix = episodeSuffix(context);
  const year = context.year.trim();
  const seen = new Set<string>();
  const queries: string[] = [];

  const emit = (raw: string): void => {
    const query = raw.trim();
    if (!query || seen.has(query)) return;
    seen.add(query);
    queries.push(query);
  };

  for (const name of searchNames(context)) {
    for (const variant of nameVariants(name)) {
      emit(`${variant}${suffix}`);
      if (year) {
        emit(`${variant} ${year}${suffix}`);
      }
    }
  }
  return queries;
};
