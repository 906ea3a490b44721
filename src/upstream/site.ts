export const DEFAULT_SITE_ORIGIN = "https://prehraj.to";

const DEFAULT_USER_AGENT = "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";
const DEFAULT_ACCEPT_LANGUAGE = "cs-CZ,cs;q=0.9,sk;q=0.8,en;q=0.7";

export const siteRequestHeaders = {
  "user-agent": DEFAULT_USER_AGENT,
  "accept-language": DEFAULT_ACCEPT_LANGUAGE
} as const;

export const buildSearchUrl = (query: string, origin = DEFAULT_SITE_ORIGIN): string => {
  return `${origin.replace(/\/+$/, "")}/hledej/${encodeURIComponent(query)}`;
};

export const resolveAddress = (href: string, origin = DEFAULT_SITE_ORIGIN): string | null => {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith("javascript:") || trimmed.startsWith("#")) {
    return null;
  }
  try {
    return new URL(trimmed, origin).toString();
  } catch {
    return null;
  }
};
