#!/usr/bin/env node

import { loadConfig, resolveSearchConcurrency, type StreamScoutConfig } from "../config";
import { createAddonHandler } from "../addon/handlers";
import { AddonServer } from "../addon/server";
import { createStreamScoutCore } from "../core/bootstrap";
import { createLogger } from "../core/logging";
import { getHelpText, parseArgs, type ParsedArgs, type SearchArgs } from "./args";
import { EXIT_EXECUTION, EXIT_SUCCESS, formatErrorPayload, toCliError } from "./errors";

const VERSION = "0.1.0";

const withSearchMode = (config: StreamScoutConfig, args: SearchArgs): StreamScoutConfig => {
  if (!args.mode || args.mode === config.search.mode) {
    return config;
  }
  return {
    ...config,
    search: {
      ...config.search,
      mode: args.mode,
      concurrency: resolveSearchConcurrency(args.mode, undefined)
    }
  };
};

async function runSearch(args: SearchArgs): Promise<void> {
  const core = createStreamScoutCore({ config: withSearchMode(loadConfig(), args) });
  try {
    const streams = await core.findStreams({
      name: args.name,
      originalName: args.originalName ?? "",
      year: args.year ?? "",
      ...(args.season !== undefined ? { season: args.season } : {}),
      ...(args.episode !== undefined ? { episode: args.episode } : {})
    });
    console.log(JSON.stringify(streams, null, 2));
  } finally {
    await core.cleanup();
  }
}

async function runServe(port: number | undefined): Promise<void> {
  const config = loadConfig();
  const core = createStreamScoutCore({ config });
  const logger = createLogger("cli");
  const server = new AddonServer(createAddonHandler({
    version: VERSION,
    metadata: core.metadata,
    findStreams: core.findStreams
  }));

  const { url } = await server.start(port ?? config.port, config.host);
  logger.info("cli.serve.ready", { data: { manifest: `${url}/manifest.json` } });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info("cli.serve.shutdown", { data: { signal } });
    await server.stop();
    await core.cleanup();
    process.exit(EXIT_SUCCESS);
  };
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error("cli.serve.shutdown_failed", { data: { error } });
        process.exit(EXIT_EXECUTION);
      });
    });
  }
}

async function run(args: ParsedArgs): Promise<void> {
  switch (args.command) {
    case "help":
      console.log(getHelpText());
      return;
    case "version":
      console.log(VERSION);
      return;
    case "search":
      if (args.search) {
        await runSearch(args.search);
      }
      return;
    case "serve":
      await runServe(args.port);
      return;
  }
}

async function main(): Promise<void> {
  try {
    await run(parseArgs(process.argv));
  } catch (error) {
    const cliError = toCliError(error);
    console.error(JSON.stringify(formatErrorPayload(cliError)));
    process.exit(cliError.exitCode);
  }
}

void main();
