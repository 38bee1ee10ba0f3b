import path from "path";
import { existsSync, writeFileSync } from "fs";
import { describe, expect, it } from "vitest";
import { StagingError } from "../src/errors/appError";
import { shellQuote } from "../src/exec/shell";
import {
  StageCommands,
  stageDataset,
  stagedArchivePath,
  stagingFailures
} from "../src/staging/stageDataset";
import { FakeShellRunner, RecordingLogger, makeTempDir, success, writeFile } from "./helpers/fixtures";

const commands: StageCommands = {
  copyCmd: "rsync",
  copyOpts: "",
  uncompressCmd: "tar",
  uncompressOpts: "-zxf"
};

/** Copies "succeed" by creating the destination file named last on the command line. */
function copyingRunner(failOn?: (command: string) => boolean): FakeShellRunner {
  return new FakeShellRunner((command) => {
    if (failOn?.(command)) {
      return { exitCode: 2, stdout: "", stderr: "boom" };
    }
    if (command.startsWith("rsync")) {
      const parts = command.split(" ");
      writeFileSync(parts[parts.length - 1], "archive");
    }
    return success();
  });
}

function setup(): { archives: string[]; destDir: string; localRoot: string } {
  const root = makeTempDir();
  const archives = [
    writeFile(path.join(root, "remote", "timit.tar.gz"), "a"),
    writeFile(path.join(root, "remote", "extra.tar.gz"), "b")
  ];
  const localRoot = path.join(root, "local");
  return { archives, destDir: path.join(localRoot, "TIMIT"), localRoot };
}

describe("shellQuote", () => {
  it("leaves plain paths alone and quotes the rest", () => {
    expect(shellQuote("/data/timit.tar.gz")).toBe("/data/timit.tar.gz");
    expect(shellQuote("/data/my corpus.tgz")).toBe("'/data/my corpus.tgz'");
    expect(shellQuote("it's")).toBe("'it'\\''s'");
  });
});

describe("stageDataset", () => {
  it("copies beside the destination and unpacks into it", async () => {
    const { archives, destDir, localRoot } = setup();
    const runner = copyingRunner();

    const report = await stageDataset(archives, destDir, commands, { runner, logger: new RecordingLogger() });

    expect(existsSync(destDir)).toBe(true);
    const copied = path.join(localRoot, "timit.tar.gz");
    expect(stagedArchivePath(archives[0], destDir)).toBe(copied);
    expect(runner.commands).toEqual([
      `rsync ${archives[0]} ${copied}`,
      `tar -zxf ${copied} -C ${destDir} --strip-components=1`,
      `rsync ${archives[1]} ${path.join(localRoot, "extra.tar.gz")}`,
      `tar -zxf ${path.join(localRoot, "extra.tar.gz")} -C ${destDir} --strip-components=1`
    ]);
    expect(report.results.map((r) => (r.ok ? r.value.status : "failed"))).toEqual(["staged", "staged"]);
  });

  it("does nothing on a second run with the same archives", async () => {
    const { archives, destDir } = setup();
    const first = copyingRunner();
    await stageDataset(archives, destDir, commands, { runner: first, logger: new RecordingLogger() });
    expect(first.commands).toHaveLength(4);

    const second = copyingRunner();
    const report = await stageDataset(archives, destDir, commands, { runner: second, logger: new RecordingLogger() });

    expect(second.commands).toEqual([]);
    expect(report.results.map((r) => (r.ok ? r.value.status : "failed"))).toEqual(["skipped", "skipped"]);
  });

  it("passes copy options and custom tools through", async () => {
    const { archives, destDir, localRoot } = setup();
    const runner = new FakeShellRunner(() => success());

    await stageDataset([archives[0]], destDir, { copyCmd: "cp", copyOpts: "-p", uncompressCmd: "bsdtar", uncompressOpts: "-xf" }, {
      runner,
      logger: new RecordingLogger()
    });

    const copied = path.join(localRoot, "timit.tar.gz");
    expect(runner.commands).toEqual([
      `cp -p ${archives[0]} ${copied}`,
      `bsdtar -xf ${copied} -C ${destDir} --strip-components=1`
    ]);
  });

  it("throws the first failure when failFast is set", async () => {
    const { archives, destDir } = setup();
    const runner = copyingRunner((command) => command.startsWith("tar"));
    const logger = new RecordingLogger();

    await expect(
      stageDataset(archives, destDir, commands, { runner, logger, failFast: true })
    ).rejects.toBeInstanceOf(StagingError);

    expect(runner.commands).toHaveLength(2);
    // The half-staged copy is removed so the next run retries it.
    expect(existsSync(stagedArchivePath(archives[0], destDir))).toBe(false);
    expect(logger.lines.filter((line) => line.level === "error")).toHaveLength(1);
  });

  it("reports every failure and keeps going without failFast", async () => {
    const { archives, destDir } = setup();
    const runner = copyingRunner((command) => command.startsWith("rsync") && command.includes("timit"));

    const report = await stageDataset(archives, destDir, commands, { runner, logger: new RecordingLogger() });
    const failures = stagingFailures(report);

    expect(failures).toHaveLength(1);
    expect(failures[0].archive).toBe(archives[0]);
    expect(failures[0].exitCode).toBe(2);
    expect(failures[0].message).toBe(`Copy of ${archives[0]} failed with exit code 2: boom`);
    expect(report.results[1].ok).toBe(true);
  });

  it("removes a partial copy so the next run copies again", async () => {
    const { archives, destDir } = setup();
    let attempts = 0;
    const runner = new FakeShellRunner((command) => {
      if (command.startsWith("rsync")) {
        attempts += 1;
        const parts = command.split(" ");
        writeFileSync(parts[parts.length - 1], attempts === 1 ? "trunc" : "archive");
        if (attempts === 1) return { exitCode: 1, stdout: "", stderr: "No space left on device" };
      }
      return success();
    });
    const staged = stagedArchivePath(archives[0], destDir);

    const first = await stageDataset([archives[0]], destDir, commands, { runner, logger: new RecordingLogger() });
    expect(stagingFailures(first)).toHaveLength(1);
    expect(existsSync(staged)).toBe(false);

    const second = await stageDataset([archives[0]], destDir, commands, { runner, logger: new RecordingLogger() });
    expect(second.results).toEqual([{ ok: true, value: { archive: archives[0], destination: staged, status: "staged" } }]);
    expect(runner.commands.filter((command) => command.startsWith("rsync"))).toHaveLength(2);
  });

  it("turns a runner that cannot start into a staging error", async () => {
    const { archives, destDir } = setup();
    const runner = new FakeShellRunner(() => {
      throw new Error("spawn ENOENT");
    });

    const report = await stageDataset([archives[0]], destDir, commands, { runner, logger: new RecordingLogger() });
    const [failure] = stagingFailures(report);

    expect(failure.exitCode).toBeNull();
    expect(failure.message).toBe(`Cannot start Copy command for ${archives[0]}: spawn ENOENT`);
  });
});
