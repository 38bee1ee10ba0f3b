import { z } from "zod";
import { ConfigError } from "../errors/appError";
import { readJson } from "../utils/fs";
import {
  CorpusConfig,
  StageConfig,
  resolveCorpusConfig,
  resolveStageConfig
} from "./corpusConfig";

const OUTPUT_DIR_ENV = "CORPUS_PREP_OUTPUT_DIR";

async function readConfigFile(configPath: string): Promise<Record<string, unknown>> {
  let data: unknown;
  try {
    data = await readJson(configPath);
  } catch (error) {
    throw new ConfigError(`Cannot read configuration file ${configPath}`, { cause: error });
  }
  const parsed = z.record(z.unknown()).safeParse(data);
  if (!parsed.success) {
    throw new ConfigError(`Configuration file ${configPath} must contain a JSON object`);
  }
  return parsed.data;
}

/** `CORPUS_PREP_OUTPUT_DIR` fills `outputFolder` when the file leaves it out. */
export function applyEnvDefaults(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const outputDir = env[OUTPUT_DIR_ENV];
  if (outputDir && raw.outputFolder === undefined) {
    return { ...raw, outputFolder: outputDir };
  }
  return raw;
}

export async function loadCorpusConfig(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<Readonly<CorpusConfig>> {
  const raw = await readConfigFile(configPath);
  return resolveCorpusConfig(applyEnvDefaults(raw, env));
}

export async function loadStageConfig(configPath: string): Promise<Readonly<StageConfig>> {
  return resolveStageConfig(await readConfigFile(configPath));
}
