import path from "path";
import { StagingError, toError } from "../errors/appError";
import { Result, err, ok } from "../errors/result";
import { ShellResult, ShellRunner, shellQuote } from "../exec/shell";
import { Logger } from "../logging/logger";
import { ensureDir, pathExists, removeFile } from "../utils/fs";

export interface StageCommands {
  copyCmd: string;
  copyOpts: string;
  uncompressCmd: string;
  uncompressOpts: string;
}

export interface StagedArchive {
  archive: string;
  destination: string;
  status: "staged" | "skipped";
}

export interface StageReport {
  destDir: string;
  results: Result<StagedArchive, StagingError>[];
}

export interface StageDeps {
  runner: ShellRunner;
  logger: Logger;
  /** Throw the first failure instead of moving on to the next archive. */
  failFast?: boolean;
}

function commandLine(parts: string[]): string {
  return parts.filter((part) => part.trim() !== "").join(" ");
}

export function copyCommand(commands: StageCommands, archive: string, destination: string): string {
  return commandLine([commands.copyCmd, commands.copyOpts, shellQuote(archive), shellQuote(destination)]);
}

export function uncompressCommand(commands: StageCommands, destination: string, destDir: string): string {
  return commandLine([
    commands.uncompressCmd,
    commands.uncompressOpts,
    shellQuote(destination),
    "-C",
    shellQuote(destDir),
    "--strip-components=1"
  ]);
}

/** Archives are copied next to the folder they unpack into. */
export function stagedArchivePath(archive: string, destDir: string): string {
  return path.join(path.dirname(path.resolve(destDir)), path.basename(archive));
}

async function runStep(
  runner: ShellRunner,
  command: string,
  archive: string,
  step: string
): Promise<StagingError | null> {
  let result: ShellResult;
  try {
    result = await runner.run(command);
  } catch (error) {
    return new StagingError(`Cannot start ${step} command for ${archive}: ${toError(error).message}`, archive, null, {
      cause: error,
      details: { command }
    });
  }
  if (result.exitCode !== 0) {
    const stderr = result.stderr.trim();
    return new StagingError(
      `${step} of ${archive} failed with exit code ${result.exitCode}${stderr ? `: ${stderr}` : ""}`,
      archive,
      result.exitCode,
      { details: { command } }
    );
  }
  return null;
}

async function stageArchive(
  archive: string,
  destDir: string,
  commands: StageCommands,
  deps: StageDeps
): Promise<Result<StagedArchive, StagingError>> {
  const destination = stagedArchivePath(archive, destDir);
  if (await pathExists(destination)) {
    deps.logger.debug(`${destination} already staged, skipping ${archive}`);
    const skipped: StagedArchive = { archive, destination, status: "skipped" };
    return ok(skipped);
  }

  deps.logger.debug(`Copying ${archive} into ${destination}`);
  const copyError = await runStep(deps.runner, copyCommand(commands, archive, destination), archive, "Copy");
  if (copyError) {
    // A partial copy would mark this archive as staged on the next run.
    await removeFile(destination);
    return err(copyError);
  }

  deps.logger.debug(`Uncompressing ${destination} into ${destDir}`);
  const uncompressError = await runStep(
    deps.runner,
    uncompressCommand(commands, destination, destDir),
    archive,
    "Uncompress"
  );
  if (uncompressError) {
    await removeFile(destination);
    return err(uncompressError);
  }

  const staged: StagedArchive = { archive, destination, status: "staged" };
  return ok(staged);
}

/**
 * Copies each archive beside `destDir` and unpacks it into `destDir`,
 * dropping the archive's top-level directory. Archives whose copy already
 * exists are skipped, so reruns do no work.
 */
export async function stageDataset(
  archives: readonly string[],
  destDir: string,
  commands: StageCommands,
  deps: StageDeps
): Promise<StageReport> {
  await ensureDir(destDir);

  const results: Result<StagedArchive, StagingError>[] = [];
  for (const archive of archives) {
    const result = await stageArchive(archive, destDir, commands, deps);
    if (!result.ok) {
      deps.logger.error(result.error, "Staging failed");
      if (deps.failFast) throw result.error;
    }
    results.push(result);
  }
  return { destDir, results };
}

export function stagingFailures(report: StageReport): StagingError[] {
  return report.results.flatMap((result) => (result.ok ? [] : [result.error]));
}
