import { promises as fs } from "fs";
import path from "path";
import { gunzipSync } from "zlib";
import { z } from "zod";
import { discoverFiles } from "../discovery/discoverFiles";
import { LabelSourceError } from "../errors/appError";
import { ensureDir, readJson, writeJson } from "../utils/fs";

/** Per-utterance frame labels, keyed by utterance id. */
export type LabelStore = ReadonlyMap<string, readonly number[]>;

export const LABEL_ARTIFACT_TYPE = "json";

const INTEGER_TOKEN = /^-?\d+$/;

const LabelArtifactSchema = z.array(z.number().int());

async function readAlignmentText(filePath: string): Promise<string> {
  const raw = await fs.readFile(filePath);
  return filePath.endsWith(".gz") ? gunzipSync(raw).toString("utf8") : raw.toString("utf8");
}

export function parseAlignmentText(text: string, source: string, into: Map<string, number[]>): void {
  const lines = text.split(/\r?\n/);
  lines.forEach((line, index) => {
    const tokens = line.trim().split(/\s+/).filter(Boolean);
    if (tokens.length === 0) return;

    const [id, ...values] = tokens;
    if (values.length === 0 || values.some((value) => !INTEGER_TOKEN.test(value))) {
      throw new LabelSourceError(`Malformed alignment line ${index + 1} in ${source}`, {
        details: { file: source, line: index + 1 }
      });
    }
    into.set(id, values.map(Number));
  });
}

/**
 * Loads Kaldi alignments in text form (`ali.*`, optionally gzipped) found
 * anywhere under `labelDir`.
 */
export async function loadLabelStore(labelDir: string): Promise<LabelStore> {
  const files = await discoverFiles(labelDir, { requireAll: ["ali."] });
  if (files.length === 0) {
    throw new LabelSourceError(`No alignment files (ali.*) found in ${labelDir}`, {
      details: { labelDir }
    });
  }

  const store = new Map<string, number[]>();
  for (const file of files) {
    parseAlignmentText(await readAlignmentText(file), file, store);
  }
  return store;
}

export function labelArtifactPath(artifactDir: string, id: string): string {
  return path.join(artifactDir, `${id}.${LABEL_ARTIFACT_TYPE}`);
}

export async function saveLabelArtifact(
  artifactDir: string,
  id: string,
  labels: readonly number[]
): Promise<string> {
  await ensureDir(artifactDir);
  const artifactPath = labelArtifactPath(artifactDir, id);
  await writeJson(artifactPath, labels);
  return artifactPath;
}

export async function loadLabelArtifact(artifactPath: string): Promise<number[]> {
  const parsed = LabelArtifactSchema.safeParse(await readJson(artifactPath));
  if (!parsed.success) {
    throw new LabelSourceError(`Label artifact ${artifactPath} is not a list of integers`);
  }
  return parsed.data;
}
