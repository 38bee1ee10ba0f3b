import { CorpusConfig, labelDirFor, selectNFor, splitsOf } from "../config/corpusConfig";
import { loadCorpusConfig } from "../config/loader";
import { saveFingerprint, shouldSkip } from "../cache/fingerprint";
import { corpusAdapterFor } from "../corpora/registry";
import { CorpusAdapter } from "../corpora/types";
import { validateCorpusRoot } from "../corpora/validators";
import { discoverFiles } from "../discovery/discoverFiles";
import { PrepareError, toError } from "../errors/appError";
import { fingerprintPath, labelArtifactDir, manifestPath } from "../io/paths";
import { buildPrepareSummary, writePrepareSummary } from "../io/prepareSummary";
import { loadLabelStore } from "../labels/labelStore";
import { Logger } from "../logging/logger";
import { LabelSource, ManifestBuildOptions, buildManifest } from "../manifest/builder";
import { removeManifest, writeManifest } from "../manifest/writer";
import { PrepareSummary, SplitSummary } from "../types/prepareSummary";
import { ensureDir, removeFile } from "../utils/fs";
import { elapsedSeconds, nowUtcIsoSeconds } from "../utils/time";

export interface PrepareOptions {
  config: Readonly<CorpusConfig>;
  logger: Logger;
  /** Replaces the audio header reader, e.g. in tests. */
  durationOf?: ManifestBuildOptions["durationOf"];
}

export interface PrepareCommandOptions {
  configPath: string;
  logger: Logger;
}

async function prepareSplit(
  config: Readonly<CorpusConfig>,
  split: string,
  adapter: CorpusAdapter,
  options: PrepareOptions,
  logger: Logger
): Promise<SplitSummary> {
  const outputPath = manifestPath(config.saveFolder, split);
  logger.debug(`Creating manifest ${outputPath}`);

  const discovery = adapter.discovery(config.dataFolder, split);
  const files = await discoverFiles(discovery.root, discovery.filter);
  if (files.length === 0) {
    logger.warn(`No audio files matched under ${discovery.root}`);
  }

  const reader = await adapter.createReader(config.dataFolder, split);

  const labelDir = labelDirFor(config, split);
  let labels: LabelSource | undefined;
  if (labelDir) {
    labels = {
      store: await loadLabelStore(labelDir),
      sourceDir: labelDir,
      artifactDir: labelArtifactDir(config.saveFolder)
    };
  }

  const result = await buildManifest(
    files,
    reader,
    {
      sampleRate: config.sampleRate,
      labels,
      labelMissingRatioLimit: config.labelMissingRatioLimit,
      selectN: selectNFor(config, split),
      durationOf: options.durationOf
    },
    logger
  );

  await writeManifest(outputPath, result.records);
  logger.info(`${outputPath} successfully created (${result.records.length} utterances)`);

  return {
    split,
    manifest_path: outputPath,
    records: result.records.length,
    examined: result.examined,
    missing_labels: result.missingLabels,
    metadata_defects: result.metadataDefects,
    label_dir: labelDir ?? null
  };
}

/**
 * Builds one manifest per configured split, unless the manifests on disk
 * were produced from an identical configuration.
 *
 * A failing split does not stop the others, but its manifest is removed and
 * the fingerprint is not written, so the next run rebuilds.
 */
export async function prepareCorpus(options: PrepareOptions): Promise<PrepareSummary> {
  const { config } = options;
  const logger = options.logger.child({ corpus: config.kind });
  const startedAt = nowUtcIsoSeconds();
  const startMs = Date.now();

  const splits = splitsOf(config);
  const outputs = splits.map((split) => manifestPath(config.saveFolder, split));
  const optionsPath = fingerprintPath(config.saveFolder, config.kind);

  if (await shouldSkip(outputs, optionsPath, config)) {
    for (const output of outputs) {
      logger.info(`${output} already up to date, skipping`);
    }
    return buildPrepareSummary({
      corpus: config.kind,
      saveFolder: config.saveFolder,
      skipped: true,
      startedAt,
      endedAt: nowUtcIsoSeconds(),
      splits: []
    });
  }

  // Manifests are about to change; an older fingerprint must not vouch for them.
  await removeFile(optionsPath);
  await validateCorpusRoot(config.dataFolder, config.kind, splits);
  await ensureDir(config.saveFolder);

  const adapter = corpusAdapterFor(config.kind);
  const summaries: SplitSummary[] = [];
  const failures: Array<{ split: string; error: Error }> = [];

  for (const split of splits) {
    const splitLogger = logger.child({ split });
    try {
      summaries.push(await prepareSplit(config, split, adapter, options, splitLogger));
    } catch (error) {
      const failure = toError(error);
      splitLogger.error(failure, "Manifest build failed");
      await removeManifest(manifestPath(config.saveFolder, split));
      failures.push({ split, error: failure });
    }
  }

  if (failures.length > 0) {
    throw new PrepareError(failures);
  }

  const summary = buildPrepareSummary({
    corpus: config.kind,
    saveFolder: config.saveFolder,
    skipped: false,
    startedAt,
    endedAt: nowUtcIsoSeconds(),
    splits: summaries
  });
  await writePrepareSummary(summary);

  // Last: marks the build complete.
  await saveFingerprint(optionsPath, config);
  logger.info(`Prepared ${summaries.length} split(s) in ${elapsedSeconds(startMs)}s`);
  return summary;
}

export async function runPrepare(options: PrepareCommandOptions): Promise<PrepareSummary> {
  const config = await loadCorpusConfig(options.configPath);
  return prepareCorpus({ config, logger: options.logger });
}
