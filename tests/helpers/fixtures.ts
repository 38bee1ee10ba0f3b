import { mkdirSync, mkdtempSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { ShellResult, ShellRunner } from "../../src/exec/shell";
import { Logger } from "../../src/logging/logger";

export function makeTempDir(): string {
  return mkdtempSync(path.join(os.tmpdir(), "corpus-prep-"));
}

export function writeFile(filePath: string, content: string | Buffer): string {
  mkdirSync(path.dirname(filePath), { recursive: true });
  writeFileSync(filePath, content);
  return filePath;
}

/** 16-bit PCM RIFF/WAVE with `samples` frames of silence. */
export function wavBuffer(samples: number, sampleRate = 16000, channels = 1): Buffer {
  const blockAlign = channels * 2;
  const dataSize = samples * blockAlign;
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + dataSize, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(channels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * blockAlign, 28);
  header.writeUInt16LE(blockAlign, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(dataSize, 40);
  return Buffer.concat([header, Buffer.alloc(dataSize)]);
}

export function sphereBuffer(samples: number): Buffer {
  const text = `NIST_1A\n   1024\nsample_count -i ${samples}\nsample_rate -i 16000\nend_head\n`;
  const header = Buffer.alloc(1024, " ");
  header.write(text, 0, "ascii");
  return header;
}

/** `fLaC` marker plus a STREAMINFO block declaring `totalSamples`. */
export function flacBuffer(totalSamples: number): Buffer {
  const marker = Buffer.from("fLaC", "ascii");
  const blockHeader = Buffer.from([0x80, 0x00, 0x00, 0x22]);
  const streamInfo = Buffer.alloc(34);
  const high = Math.floor(totalSamples / 2 ** 32);
  // Upper nibble belongs to bits-per-sample; it must be ignored.
  streamInfo[13] = 0xf0 | (high & 0x0f);
  streamInfo.writeUInt32BE(totalSamples % 2 ** 32, 14);
  return Buffer.concat([marker, blockHeader, streamInfo]);
}

export interface LoggedLine {
  level: "debug" | "info" | "warn" | "error";
  message: string;
}

export class RecordingLogger implements Logger {
  constructor(public readonly lines: LoggedLine[] = []) {}

  debug(message: string): void {
    this.lines.push({ level: "debug", message });
  }

  info(message: string): void {
    this.lines.push({ level: "info", message });
  }

  warn(message: string): void {
    this.lines.push({ level: "warn", message });
  }

  error(error: Error, message?: string): void {
    this.lines.push({ level: "error", message: message ? `${message}: ${error.message}` : error.message });
  }

  child(): Logger {
    return this;
  }
}

export class FakeShellRunner implements ShellRunner {
  public readonly commands: string[] = [];

  constructor(private readonly handler: (command: string) => ShellResult | Promise<ShellResult>) {}

  async run(command: string): Promise<ShellResult> {
    this.commands.push(command);
    return this.handler(command);
  }
}

export function success(): ShellResult {
  return { exitCode: 0, stdout: "", stderr: "" };
}

export interface TimitUtterance {
  speaker: string;
  sentence: string;
  /** `train` or `test`. */
  folder: "train" | "test";
  samples?: number;
  phonemes?: string[] | null;
  words?: string[] | null;
}

function alignedLines(tokens: string[]): string {
  return tokens.map((token, index) => `${index * 100} ${(index + 1) * 100} ${token}\n`).join("");
}

/** Lays out a TIMIT-style tree: `<folder>/dr1/<speaker>/<sentence>.{wav,phn,wrd}`. */
export function writeTimitCorpus(root: string, utterances: TimitUtterance[]): string[] {
  mkdirSync(path.join(root, "train", "dr1"), { recursive: true });
  mkdirSync(path.join(root, "test", "dr1"), { recursive: true });
  return utterances.map((utt) => {
    const base = path.join(root, utt.folder, "dr1", utt.speaker, utt.sentence);
    writeFile(`${base}.wav`, wavBuffer(utt.samples ?? 1600));
    const phonemes = utt.phonemes === undefined ? ["h#", "b", "ae", "h#"] : utt.phonemes;
    const words = utt.words === undefined ? ["bad", "cat"] : utt.words;
    if (phonemes) writeFile(`${base}.phn`, alignedLines(phonemes));
    if (words) writeFile(`${base}.wrd`, alignedLines(words));
    return `${base}.wav`;
  });
}

export function alignmentText(ids: string[]): string {
  return ids.map((id, index) => `${id} ${index} ${index} ${index + 1}\n`).join("");
}
