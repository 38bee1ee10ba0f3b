import { promises as fs } from "fs";
import type { FileHandle } from "fs/promises";
import { AudioFormatError } from "../errors/appError";

export type AudioContainer = "wav" | "sphere" | "flac";

/** Bytes read from the start of a file; enough for the SPHERE and FLAC headers. */
const HEADER_PROBE_BYTES = 64 * 1024;

async function readAt(handle: FileHandle, position: number, length: number): Promise<Buffer> {
  const buffer = Buffer.alloc(length);
  const { bytesRead } = await handle.read(buffer, 0, length, position);
  return buffer.subarray(0, bytesRead);
}

export function detectContainer(head: Buffer): AudioContainer | null {
  if (head.length >= 12 && head.toString("ascii", 0, 4) === "RIFF" && head.toString("ascii", 8, 12) === "WAVE") {
    return "wav";
  }
  if (head.length >= 7 && head.toString("ascii", 0, 7) === "NIST_1A") {
    return "sphere";
  }
  if (head.length >= 4 && head.toString("ascii", 0, 4) === "fLaC") {
    return "flac";
  }
  return null;
}

/** Walks RIFF chunks in place, so a data chunk may sit anywhere in the file. */
async function riffSampleCount(handle: FileHandle, filePath: string): Promise<number> {
  let offset = 12;
  let blockAlign: number | null = null;

  for (;;) {
    const header = await readAt(handle, offset, 8);
    if (header.length < 8) break;
    const chunkId = header.toString("ascii", 0, 4);
    const chunkSize = header.readUInt32LE(4);
    const body = offset + 8;

    if (chunkId === "fmt ") {
      const fmt = await readAt(handle, body, 14);
      if (fmt.length < 14) break;
      blockAlign = fmt.readUInt16LE(12);
    } else if (chunkId === "data") {
      if (!blockAlign) {
        throw new AudioFormatError(`WAV file ${filePath} has a data chunk before its fmt chunk`);
      }
      return Math.floor(chunkSize / blockAlign);
    }
    // Chunks are padded to even sizes.
    offset = body + chunkSize + (chunkSize % 2);
  }

  throw new AudioFormatError(`WAV file ${filePath} has no readable fmt/data chunks`);
}

function sphereSampleCount(head: Buffer, filePath: string): number {
  // Line 2 of the header holds its total size; fields follow as "name -type value".
  const headerText = head.toString("ascii", 0, Math.min(head.length, 1024 * 16));
  const match = /^sample_count\s+-i\s+(\d+)\s*$/m.exec(headerText);
  if (!match) {
    throw new AudioFormatError(`SPHERE file ${filePath} has no sample_count field`);
  }
  return Number.parseInt(match[1], 10);
}

function flacSampleCount(head: Buffer, filePath: string): number {
  // STREAMINFO is always the first metadata block: 4-byte block header at offset 4,
  // total samples in the low 36 bits of bytes 13..17 of the block body.
  const blockType = head.length > 4 ? head[4] & 0x7f : -1;
  if (blockType !== 0 || head.length < 8 + 18) {
    throw new AudioFormatError(`FLAC file ${filePath} does not start with STREAMINFO`);
  }
  const body = 8;
  const high = head[body + 13] & 0x0f;
  const low = head.readUInt32BE(body + 14);
  const total = high * 2 ** 32 + low;
  if (total === 0) {
    // Zero means the encoder did not record a total.
    throw new AudioFormatError(`FLAC file ${filePath} does not declare its sample count`);
  }
  return total;
}

/**
 * Number of sample frames in an audio file, read from its header.
 * Handles RIFF/WAVE, NIST SPHERE and FLAC.
 */
export async function readSampleCount(filePath: string): Promise<number> {
  const handle = await fs.open(filePath, "r");
  try {
    const head = await readAt(handle, 0, HEADER_PROBE_BYTES);
    switch (detectContainer(head)) {
      case "wav":
        return await riffSampleCount(handle, filePath);
      case "sphere":
        return sphereSampleCount(head, filePath);
      case "flac":
        return flacSampleCount(head, filePath);
      default:
        throw new AudioFormatError(`Unrecognized audio format: ${filePath}`);
    }
  } finally {
    await handle.close();
  }
}

export async function audioDuration(filePath: string, sampleRate: number): Promise<number> {
  return (await readSampleCount(filePath)) / sampleRate;
}
