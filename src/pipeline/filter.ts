import { normalizeForMatch } from "./normalize";
import type { Candidate, TitleContext } from "./types";

const YEAR_TOKEN_RE = /\b(?:19|20)\d{2}\b/g;
const NUMERIC_RE = /^\d+$/;

export interface FilterReport {
  candidates: Candidate[];
  rejectedByYear: number;
  duplicates: number;
  unmatchedTitles: number;
}

export const parseTargetYear = (year: string): number | null => {
  const trimmed = year.trim();
  if (!NUMERIC_RE.test(trimmed)) return null;
  const value = Number(trimmed);
  return value > 0 ? value : null;
};

export const extractYearTokens = (title: string): number[] => {
  return [...title.matchAll(YEAR_TOKEN_RE)].map((match) => Number(match[0]));
};

/** A title without any year token passes; one with year tokens must carry the target year. */
export const matchesTargetYear = (title: string, targetYear: number | null): boolean => {
  if (targetYear === null) return true;
  const years = extractYearTokens(title);
  return years.length === 0 || years.includes(targetYear);
};

export const isTitleRelevant = (title: string, names: readonly string[]): boolean => {
  const normalizedTitle = normalizeForMatch(title);
  return names.some((name) => {
    const normalizedName = normalizeForMatch(name);
    return normalizedName.length > 0 && normalizedTitle.includes(normalizedName);
  });
};

export const dedupeByAddress = (candidates: readonly Candidate[]): Candidate[] => {
  const seen = new Set<string>();
  const unique: Candidate[] = [];
  for (const candidate of candidates) {
    if (seen.has(candidate.address)) continue;
    seen.add(candidate.address);
    unique.push(candidate);
  }
  return unique;
};

/**
 * Year filter, then address dedupe. Name relevance is counted for the report
 * and never rejects a candidate.
 */
export const filterCandidates = (
  candidates: readonly Candidate[],
  context: Pick<TitleContext, "name" | "originalName" | "year">
): FilterReport => {
  const targetYear = parseTargetYear(context.year);
  const names = context.originalName && context.originalName !== context.name
    ? [context.name, context.originalName]
    : [context.name];

  let rejectedByYear = 0;
  let unmatchedTitles = 0;
  const kept: Candidate[] = [];
  for (const candidate of candidates) {
    if (!matchesTargetYear(candidate.title, targetYear)) {
      rejectedByYear += 1;
      continue;
    }
    if (!isTitleRelevant(candidate.title, names)) {
      unmatchedTitles += 1;
    }
    kept.push(candidate);
  }

  const unique = dedupeByAddress(kept);
  return {
    candidates: unique,
    rejectedByYear,
    duplicates: kept.length - unique.length,
    unmatchedTitles
  };
};
