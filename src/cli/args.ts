import type { SearchMode } from "../config";
import { createUsageError } from "./errors";

export type CliCommand = "serve" | "search" | "help" | "version";

export interface SearchArgs {
  name: string;
  originalName?: string;
  year?: string;
  season?: number;
  episode?: number;
  mode?: SearchMode;
}

export interface ParsedArgs {
  command: CliCommand;
  port?: number;
  search?: SearchArgs;
}

const SHORT_FLAGS: Record<string, string> = {
  "-h": "--help",
  "-v": "--version",
  "-n": "--name",
  "-y": "--year",
  "-p": "--port"
};

const VALUE_FLAGS: Record<Exclude<CliCommand, "help" | "version">, Set<string>> = {
  serve: new Set(["--port"]),
  search: new Set(["--name", "--original-name", "--year", "--season", "--episode", "--mode"])
};

function expandShortFlags(args: string[]): string[] {
  return args.map((arg) => SHORT_FLAGS[arg] ?? arg);
}

function parseCount(flag: string, value: string, min: number): number {
  if (!/^\d+$/.test(value) || Number(value) < min) {
    throw createUsageError(`Invalid ${flag}: ${value}`);
  }
  return Number(value);
}

function readFlagValues(args: string[], allowed: Set<string>): Map<string, string> {
  const values = new Map<string, string>();
  for (let index = 0; index < args.length; index += 1) {
    const arg = args[index] ?? "";
    const [flag = "", inline] = arg.startsWith("--") && arg.includes("=")
      ? [arg.slice(0, arg.indexOf("=")), arg.slice(arg.indexOf("=") + 1)]
      : [arg, undefined];

    if (!flag.startsWith("-")) {
      throw createUsageError(`Unexpected argument: ${arg}`);
    }
    if (!allowed.has(flag)) {
      throw createUsageError(`Unknown flag: ${flag}`);
    }
    const value = inline ?? args[index + 1];
    if (value === undefined || (inline === undefined && value.startsWith("--"))) {
      throw createUsageError(`Missing value for ${flag}`);
    }
    if (inline === undefined) {
      index += 1;
    }
    values.set(flag, value);
  }
  return values;
}

function parseSearchArgs(values: Map<string, string>): SearchArgs {
  const name = values.get("--name")?.trim();
  if (!name) {
    throw createUsageError("Missing required flag: --name");
  }

  const mode = values.get("--mode");
  if (mode !== undefined && mode !== "browser" && mode !== "http") {
    throw createUsageError(`Invalid --mode: ${mode}`);
  }

  const seasonValue = values.get("--season");
  const episodeValue = values.get("--episode");
  if ((seasonValue === undefined) !== (episodeValue === undefined)) {
    throw createUsageError("--season and --episode must be given together");
  }

  const originalName = values.get("--original-name")?.trim();
  const year = values.get("--year")?.trim();
  return {
    name,
    ...(originalName ? { originalName } : {}),
    ...(year ? { year } : {}),
    ...(seasonValue !== undefined ? { season: parseCount("--season", seasonValue, 1) } : {}),
    ...(episodeValue !== undefined ? { episode: parseCount("--episode", episodeValue, 1) } : {}),
    ...(mode ? { mode } : {})
  };
}

export function parseArgs(argv: string[]): ParsedArgs {
  const args = expandShortFlags(argv.slice(2));

  if (args.includes("--help")) {
    return { command: "help" };
  }
  if (args.includes("--version")) {
    return { command: "version" };
  }

  const [first, ...rest] = args;
  let command: "serve" | "search" = "serve";
  let flags = args;
  if (first !== undefined && !first.startsWith("-")) {
    if (first !== "serve" && first !== "search") {
      throw createUsageError(`Unknown command: ${first}`);
    }
    command = first;
    flags = rest;
  }

  const values = readFlagValues(flags, VALUE_FLAGS[command]);
  if (command === "search") {
    return { command, search: parseSearchArgs(values) };
  }

  const port = values.get("--port");
  return port === undefined ? { command } : { command, port: parseCount("--port", port, 0) };
}

export function getHelpText(): string {
  return `
streamscout - Ranked Prehraj.to streams for movies and series

USAGE:
  streamscout [serve] [--port <port>]
  streamscout search --name <title> [options]

COMMANDS:
  serve            Start the add-on HTTP server (default)
  search           Run one search and print ranked streams as JSON

SEARCH OPTIONS:
  --name, -n       Localized title (required)
  --original-name  Original title
  --year, -y       Release year
  --season         Season number (with --episode)
  --episode        Episode number (with --season)
  --mode           browser | http

GLOBAL OPTIONS:
  --port, -p       Port for serve (overrides config and PORT)
  --help, -h       Show this help message
  --version, -v    Show version

EXAMPLES:
  streamscout serve --port 7000
  streamscout search --name "Wicked" --year 2024 --mode http
  streamscout search -n "Dexter" --season 1 --episode 3
`.trim();
}
