#!/usr/bin/env node
import fs from "node:fs/promises";
import path from "node:path";
import { parseArgs } from "node:util";
import { FileCache } from "./cache/file-cache";
import { LayeredCache } from "./cache/layered-cache";
import { MemoryCache } from "./cache/memory-cache";
import type { Cache } from "./cache/types";
import { loadConfig } from "./config";
import { InvalidRequestError, RepositoryUnavailableError } from "./errors";
import { type PipelineDeps, createDefaultDeps, resolveRootCause } from "./pipeline";
import type { ResolverConfig } from "./types";
import { loadCredentials, missingRequiredCredentials } from "./utils/env";
import { errorMessage } from "./utils/error";
import { type Logger, logger as defaultLogger } from "./utils/logger";

export const EXIT_OK = 0;
export const EXIT_TERMINAL = 1;
export const EXIT_SETUP = 2;

const USAGE = "usage: fixtrace --input <request.json> --output <response.json> [--config <fixtrace.yaml>]";

export interface CliRuntime {
  cwd: string;
  env: Record<string, string | undefined>;
  logger: Logger;
  /** Replaces the collectors and providers built from config */
  deps?: (config: ResolverConfig) => PipelineDeps;
}

async function buildCache(config: ResolverConfig, cwd: string, logger: Logger): Promise<Cache<unknown> | undefined> {
  if (!config.cache.enabled) return undefined;
  const files = new FileCache({ dir: path.resolve(cwd, config.cache.dir), logger });
  try {
    const { pruned, failed } = await files.prune();
    if (pruned > 0 || failed > 0) logger.debug(`cache: pruned ${pruned} expired entries, ${failed} could not be removed`);
  } catch (e) {
    logger.warn(`cache: prune failed: ${errorMessage(e)}`);
  }
  return new LayeredCache<unknown>([new MemoryCache<unknown>(), files]);
}

/** Run one request end to end and return the process exit code. */
export async function runCli(argv: string[], runtime: CliRuntime): Promise<number> {
  const { cwd, env, logger } = runtime;

  let args: { input?: string; output?: string; config?: string };
  try {
    args = parseArgs({
      args: argv,
      options: {
        input: { type: "string", short: "i" },
        output: { type: "string", short: "o" },
        config: { type: "string", short: "c" },
      },
      strict: true,
    }).values;
  } catch (e) {
    logger.error(`${errorMessage(e)}\n${USAGE}`);
    return EXIT_SETUP;
  }
  if (!args.input || !args.output) {
    logger.error(USAGE);
    return EXIT_SETUP;
  }

  let config: ResolverConfig;
  try {
    config = await loadConfig({ cwd, env, configPath: args.config });
  } catch (e) {
    logger.error(errorMessage(e));
    return EXIT_SETUP;
  }

  const missing = missingRequiredCredentials(env, config);
  if (missing.length > 0) {
    logger.error(`missing required credentials: ${missing.join(", ")}`);
    return EXIT_SETUP;
  }

  const inputPath = path.resolve(cwd, args.input);
  let request: unknown;
  try {
    request = JSON.parse(await fs.readFile(inputPath, "utf-8"));
  } catch (e) {
    logger.error(`cannot read request ${inputPath}: ${errorMessage(e)}`);
    return EXIT_SETUP;
  }

  const deps = runtime.deps
    ? runtime.deps(config)
    : createDefaultDeps(config, loadCredentials(env, config), { logger, cache: await buildCache(config, cwd, logger) });

  try {
    const { response } = await resolveRootCause(request, deps);
    const outputPath = path.resolve(cwd, args.output);
    await fs.mkdir(path.dirname(outputPath), { recursive: true });
    await fs.writeFile(outputPath, JSON.stringify(response, null, 2) + "\n", "utf-8");
    logger.info(`wrote ${response.status} verdict to ${outputPath}`);
    return EXIT_OK;
  } catch (e) {
    if (e instanceof InvalidRequestError || e instanceof RepositoryUnavailableError) {
      logger.error(e.message);
      return EXIT_TERMINAL;
    }
    logger.error(e instanceof Error && e.stack ? e.stack : String(e));
    return EXIT_TERMINAL;
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2), { cwd: process.cwd(), env: process.env, logger: defaultLogger })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((e) => {
      // eslint-disable-next-line no-console
      console.error(e instanceof Error && e.stack ? e.stack : String(e));
      process.exitCode = EXIT_TERMINAL;
    });
}
