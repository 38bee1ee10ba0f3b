import { StageConfig } from "../config/corpusConfig";
import { loadStageConfig } from "../config/loader";
import { ShellRunner, SpawnShellRunner } from "../exec/shell";
import { Logger } from "../logging/logger";
import { StageReport, stageDataset, stagingFailures } from "../staging/stageDataset";

export interface StageOptions {
  config: Readonly<StageConfig>;
  logger: Logger;
  runner?: ShellRunner;
}

export interface StageCommandOptions {
  configPath: string;
  logger: Logger;
}

export async function stageCorpus(options: StageOptions): Promise<StageReport> {
  const { config } = options;
  const logger = options.logger.child({ step: "stage" });
  const report = await stageDataset(config.dataFiles, config.localFolder, config, {
    runner: options.runner ?? new SpawnShellRunner(),
    logger,
    failFast: config.failFast
  });

  const staged = report.results.filter((result) => result.ok && result.value.status === "staged").length;
  const failed = stagingFailures(report).length;
  logger.info(
    `${staged} archive(s) staged, ${report.results.length - staged - failed} already present, ${failed} failed`
  );
  return report;
}

export async function runStage(options: StageCommandOptions): Promise<void> {
  const config = await loadStageConfig(options.configPath);
  const report = await stageCorpus({ config, logger: options.logger });
  const failures = stagingFailures(report);
  if (failures.length === 1) {
    throw failures[0];
  }
  if (failures.length > 1) {
    throw new AggregateError(
      failures,
      `${failures.length} archives failed to stage: ${failures.map((f) => f.archive).join(", ")}`
    );
  }
}
