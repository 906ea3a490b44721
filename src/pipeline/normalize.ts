const COMBINING_MARKS_RE = /[\u0300-\u036f]/g;
const SEPARATOR_RE = /[._\-:]/g;
const SPACE_RE = /\s+/g;

/** Folds diacritics to ASCII, turns `. _ - :` into spaces and collapses whitespace. */
export const normalizeTitle = (value: string): string => {
  return value
    .normalize("NFD")
    .replace(COMBINING_MARKS_RE, "")
    .replace(SEPARATOR_RE, " ")
    .replace(SPACE_RE, " ")
    .trim();
};

export const normalizeForMatch = (value: string): string => normalizeTitle(value).toLowerCase();
