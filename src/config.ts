import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import { parse as parseJsonc } from "jsonc-parser";

export type SearchMode = "browser" | "http";

export type SiteConfig = {
  origin: string;
};

export type SearchConfig = {
  mode: SearchMode;
  concurrency: number;
  settleMs: number;
  timeoutMs: number;
  headless: boolean;
  chromePath?: string;
};

export type ExtractionConfig = {
  concurrency: number;
  maxCandidates: number;
  timeoutMs: number;
};

export type TmdbConfig = {
  apiKey?: string;
  language: string;
  timeoutMs: number;
  concurrency: number;
};

export type StreamScoutConfig = {
  port: number;
  host: string;
  logLevel: "debug" | "info" | "warn" | "error";
  site: SiteConfig;
  search: SearchConfig;
  extraction: ExtractionConfig;
  tmdb: TmdbConfig;
};

const DEFAULT_PORT = 8080;
const BROWSER_SEARCH_CONCURRENCY = 1;
const HTTP_SEARCH_CONCURRENCY = 4;

const siteSchema = z.object({
  origin: z.string().url().default("https://prehraj.to")
});

const searchSchema = z.object({
  mode: z.enum(["browser", "http"]).default("browser"),
  concurrency: z.number().int().min(1).max(16).optional(),
  settleMs: z.number().int().min(0).max(30000).default(2000),
  timeoutMs: z.number().int().min(1000).max(120000).default(30000),
  headless: z.boolean().default(true),
  chromePath: z.string().min(1).optional()
});

const extractionSchema = z.object({
  concurrency: z.number().int().min(1).max(32).default(5),
  maxCandidates: z.number().int().min(1).max(200).default(25),
  timeoutMs: z.number().int().min(1000).max(120000).default(10000)
});

const tmdbSchema = z.object({
  apiKey: z.string().min(1).optional(),
  language: z.string().min(2).default("cs-CZ"),
  timeoutMs: z.number().int().min(1000).max(120000).default(10000),
  concurrency: z.number().int().min(1).max(32).default(5)
});

const configSchema = z.object({
  port: z.number().int().min(0).max(65535).default(DEFAULT_PORT),
  host: z.string().min(1).default("0.0.0.0"),
  logLevel: z.enum(["debug", "info", "warn", "error"]).default("info"),
  site: siteSchema.default({}),
  search: searchSchema.default({}),
  extraction: extractionSchema.default({}),
  tmdb: tmdbSchema.default({})
});

const CONFIG_FILE_NAME = "streamscout.jsonc";

type Env = Record<string, string | undefined>;

export function getConfigPath(env: Env = process.env, cwd = process.cwd()): string {
  const override = env.STREAMSCOUT_CONFIG?.trim();
  if (override) {
    return path.resolve(cwd, override);
  }
  return path.join(cwd, CONFIG_FILE_NAME);
}

function loadConfigFile(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) {
    return {};
  }
  const content = fs.readFileSync(filePath, "utf-8");
  const errors: Array<{ error: number; offset: number; length: number }> = [];
  const parsed: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const firstError = errors[0];
    throw new Error(`Invalid JSONC in streamscout config at ${filePath}: parse error at offset ${firstError?.offset ?? 0}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return {};
  }
  return { ...parsed };
}

const readSection = (raw: Record<string, unknown>, key: string): Record<string, unknown> => {
  const section = raw[key];
  return typeof section === "object" && section !== null && !Array.isArray(section) ? { ...section } : {};
};

const parsePort = (value: string): number | string => {
  const port = Number(value);
  return Number.isInteger(port) ? port : value;
};

function applyEnvOverrides(raw: Record<string, unknown>, env: Env): Record<string, unknown> {
  const next: Record<string, unknown> = { ...raw };
  const search = readSection(raw, "search");
  const tmdb = readSection(raw, "tmdb");

  if (env.PORT?.trim()) {
    next.port = parsePort(env.PORT.trim());
  }
  if (env.STREAMSCOUT_LOG_LEVEL?.trim()) {
    next.logLevel = env.STREAMSCOUT_LOG_LEVEL.trim();
  }
  if (env.STREAMSCOUT_SEARCH_MODE?.trim()) {
    search.mode = env.STREAMSCOUT_SEARCH_MODE.trim();
  }
  if (env.CHROME_PATH?.trim()) {
    search.chromePath = env.CHROME_PATH.trim();
  }
  if (env.TMDB_API_KEY?.trim()) {
    tmdb.apiKey = env.TMDB_API_KEY.trim();
  }

  next.search = search;
  next.tmdb = tmdb;
  return next;
}

// A browser-backed search shares one page, so it never runs more than one query at a time.
export function resolveSearchConcurrency(mode: SearchMode, requested: number | undefined): number {
  if (mode === "browser") {
    return BROWSER_SEARCH_CONCURRENCY;
  }
  return requested ?? HTTP_SEARCH_CONCURRENCY;
}

export function loadConfig(env: Env = process.env, cwd = process.cwd()): StreamScoutConfig {
  const configPath = getConfigPath(env, cwd);
  const raw = applyEnvOverrides(loadConfigFile(configPath), env);
  const parsed = configSchema.safeParse(raw);

  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "config"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid streamscout config at ${configPath}: ${issues}`);
  }

  const data = parsed.data;
  const { concurrency, chromePath, ...search } = data.search;
  return {
    ...data,
    search: {
      ...search,
      concurrency: resolveSearchConcurrency(search.mode, concurrency),
      ...(chromePath ? { chromePath } : {})
    },
    tmdb: {
      language: data.tmdb.language,
      timeoutMs: data.tmdb.timeoutMs,
      concurrency: data.tmdb.concurrency,
      ...(data.tmdb.apiKey ? { apiKey: data.tmdb.apiKey } : {})
    }
  };
}
