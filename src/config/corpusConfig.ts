import path from "path";
import { z } from "zod";
import {
  boundedIntListOption,
  directoryOption,
  enumListOption,
  fileOption,
  ratioOption,
  resolveConfig
} from "./options";

export const TIMIT_SPLITS = ["train", "dev", "test"] as const;
export const LIBRISPEECH_SPLITS = [
  "dev-clean",
  "dev-other",
  "test-clean",
  "test-other",
  "train-clean-100",
  "train-clean-360",
  "train-other-500"
] as const;

export type TimitSplit = (typeof TIMIT_SPLITS)[number];
export type LibrispeechSplit = (typeof LIBRISPEECH_SPLITS)[number];

const commonOptions = {
  dataFolder: directoryOption(),
  labelMissingRatioLimit: ratioOption(0.05),
  /** One entry per split, in split order. */
  selectN: boundedIntListOption(1).optional(),
  sampleRate: z.number().int().positive().default(16000),
  saveFolder: z.string().min(1).optional(),
  outputFolder: z.string().min(1).default("output")
};

const TimitConfigSchema = z
  .object({
    kind: z.literal("timit"),
    splits: enumListOption(TIMIT_SPLITS),
    labelDirs: z
      .object({
        train: directoryOption().optional(),
        dev: directoryOption().optional(),
        test: directoryOption().optional()
      })
      .strict()
      .default({}),
    ...commonOptions
  })
  .strict();

const LibrispeechConfigSchema = z
  .object({
    kind: z.literal("librispeech"),
    splits: enumListOption(LIBRISPEECH_SPLITS),
    labelDirs: z.record(z.enum(LIBRISPEECH_SPLITS), directoryOption()).default({}),
    ...commonOptions
  })
  .strict();

export const CorpusConfigSchema = z
  .discriminatedUnion("kind", [TimitConfigSchema, LibrispeechConfigSchema])
  .superRefine((config, ctx) => {
    if (config.selectN && config.selectN.length !== config.splits.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["selectN"],
        message: `expected ${config.splits.length} entries (one per split), got ${config.selectN.length}`
      });
    }
  })
  .transform((config) => ({
    ...config,
    saveFolder: config.saveFolder ?? path.join(config.outputFolder, `${config.kind}_prepare`)
  }));

export type CorpusConfig = z.output<typeof CorpusConfigSchema>;
export type TimitConfig = Extract<CorpusConfig, { kind: "timit" }>;
export type LibrispeechConfig = Extract<CorpusConfig, { kind: "librispeech" }>;
export type CorpusKind = CorpusConfig["kind"];

export const StageConfigSchema = z
  .object({
    dataFiles: z.array(fileOption()).min(1),
    localFolder: z.string().min(1),
    copyCmd: z.string().min(1).default("rsync"),
    copyOpts: z.string().default(""),
    uncompressCmd: z.string().min(1).default("tar"),
    uncompressOpts: z.string().default("-zxf"),
    /** Stop at the first failed archive instead of reporting all failures at the end. */
    failFast: z.boolean().default(true)
  })
  .strict();

export type StageConfig = z.output<typeof StageConfigSchema>;

export function resolveCorpusConfig(raw: unknown): Readonly<CorpusConfig> {
  return resolveConfig(CorpusConfigSchema, raw, "corpus configuration");
}

export function resolveStageConfig(raw: unknown): Readonly<StageConfig> {
  return resolveConfig(StageConfigSchema, raw, "stage configuration");
}

/** Split names of the config, whichever corpus it describes. */
export function splitsOf(config: CorpusConfig): readonly string[] {
  return config.splits;
}

export function labelDirFor(config: CorpusConfig, split: string): string | undefined {
  return Object.entries(config.labelDirs).find(([name]) => name === split)?.[1];
}

export function selectNFor(config: CorpusConfig, split: string): number | undefined {
  if (!config.selectN) return undefined;
  const index = splitsOf(config).indexOf(split);
  return index >= 0 ? config.selectN[index] : undefined;
}
