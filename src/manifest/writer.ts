import { ManifestRecord } from "../types/manifestRecord";
import { removeFile, writeLines } from "../utils/fs";
import { formatRecord } from "./format";

/**
 * Replaces the manifest at `manifestPath`. Every line is formatted before
 * anything touches disk, and the file appears only once complete.
 */
export async function writeManifest(manifestPath: string, records: ManifestRecord[]): Promise<void> {
  const lines = records.map(formatRecord);
  await writeLines(manifestPath, lines);
}

export async function removeManifest(manifestPath: string): Promise<void> {
  await removeFile(manifestPath);
}
