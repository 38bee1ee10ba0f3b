import { spawn } from "child_process";

export interface ShellResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

/** Runs one command line through the shell. */
export interface ShellRunner {
  run(command: string): Promise<ShellResult>;
}

/**
 * Quotes an argument for a POSIX shell. Plain paths are left untouched so
 * logged commands stay readable.
 */
export function shellQuote(arg: string): string {
  if (arg === "") return "''";
  if (/^[A-Za-z0-9_\/.,:=+@%-]+$/.test(arg)) return arg;
  return `'${arg.replace(/'/g, `'\\''`)}'`;
}

export class SpawnShellRunner implements ShellRunner {
  constructor(private readonly cwd: string = process.cwd()) {}

  run(command: string): Promise<ShellResult> {
    return new Promise((resolve, reject) => {
      const child = spawn(command, { cwd: this.cwd, shell: true, stdio: ["ignore", "pipe", "pipe"] });
      const stdout: Buffer[] = [];
      const stderr: Buffer[] = [];

      child.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
      child.on("error", reject);
      child.on("close", (code) => {
        resolve({
          exitCode: code,
          stdout: Buffer.concat(stdout).toString("utf8"),
          stderr: Buffer.concat(stderr).toString("utf8")
        });
      });
    });
  }
}
