#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command, InvalidArgumentError } from "commander";
import pkg from "../../package.json";
import { runPrepare } from "../commands/prepare";
import { runStage } from "../commands/stage";
import { exitCodeFor } from "../errors/appError";
import { ConsoleLogger, LOG_LEVELS, LogLevel, isLogLevel } from "../logging/logger";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.CORPUS_PREP_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${LOG_LEVELS.join(", ")}.`);
  }
  return value;
}

const defaultEnvPath = path.resolve(process.cwd(), ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

const envLogLevel = process.env.CORPUS_PREP_LOG_LEVEL;
const defaultLogLevel: LogLevel = envLogLevel && isLogLevel(envLogLevel) ? envLogLevel : "info";

const program = new Command();

program
  .name("corpus-prep")
  .description("Builds training manifests from speech corpora")
  .version(pkg.version);

program
  .option(
    "--env-file <path>",
    "Path to .env file (overrides CORPUS_PREP_ENV_FILE/DOTENV_CONFIG_PATH)",
    envPath
  )
  .option("--log-level <level>", "debug | info | warn | error", parseLogLevel, defaultLogLevel);

function createLogger(): ConsoleLogger {
  const opts = program.opts<{ logLevel: LogLevel }>();
  return new ConsoleLogger(opts.logLevel);
}

program
  .command("prepare")
  .description("Write one manifest per split of a TIMIT or LibriSpeech corpus")
  .requiredOption("--config <path>", "Corpus configuration (JSON)")
  .action(async (opts: { config: string }) => {
    await runPrepare({ configPath: opts.config, logger: createLogger() });
  });

program
  .command("stage")
  .description("Copy and uncompress archived corpora into a local folder")
  .requiredOption("--config <path>", "Stage configuration (JSON)")
  .action(async (opts: { config: string }) => {
    await runStage({ configPath: opts.config, logger: createLogger() });
  });

program.parseAsync().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = exitCodeFor(error);
});
