import { promises as fs } from "fs";
import path from "path";
import { TimitSplit } from "../config/corpusConfig";
import { FileFilter } from "../discovery/discoverFiles";
import { MetadataError } from "../errors/appError";
import { Result, err, ok } from "../errors/result";
import { UtteranceIdentity, UtteranceReader } from "../manifest/builder";
import { joinTokens } from "../manifest/format";
import { ManifestField } from "../types/manifestRecord";
import speakers from "./timitSpeakers.json";
import { CorpusAdapter, SplitDiscovery } from "./types";

export const TIMIT_DEV_SPEAKERS: readonly string[] = speakers.dev;
export const TIMIT_TEST_SPEAKERS: readonly string[] = speakers.test;

/** Dialect calibration sentences, read by every speaker. */
export const CALIBRATION_SENTENCES: readonly string[] = ["sa1", "sa2"];

/** Phoneme symbols rewritten before joining. */
export const PHONEME_RELABEL: Readonly<Record<string, string>> = { "h#": "sil" };

const AUDIO_EXTENSION = ".wav";

export function isTimitSplit(split: string): split is TimitSplit {
  return split === "train" || split === "dev" || split === "test";
}

/** Dev and test both live under `test/`; speaker codes tell them apart. */
export function timitSplitFilter(split: TimitSplit): FileFilter {
  switch (split) {
    case "train":
      return { requireAll: [AUDIO_EXTENSION, "train"], excludeAnyOf: CALIBRATION_SENTENCES };
    case "dev":
      return {
        requireAll: [AUDIO_EXTENSION, "test"],
        requireAnyOf: TIMIT_DEV_SPEAKERS,
        excludeAnyOf: CALIBRATION_SENTENCES
      };
    case "test":
      return {
        requireAll: [AUDIO_EXTENSION, "test"],
        requireAnyOf: TIMIT_TEST_SPEAKERS,
        excludeAnyOf: CALIBRATION_SENTENCES
      };
  }
}

/**
 * Reads the token column of a `.wrd` / `.phn` file (`<start> <end> <token>`
 * per line), applying `relabel` to each token.
 */
export function parseAlignedTokens(
  text: string,
  source: string,
  relabel: Readonly<Record<string, string>> = {}
): Result<string[], MetadataError> {
  const tokens: string[] = [];
  const lines = text.split(/\r?\n/);
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index].trim();
    if (!line) continue;
    const columns = line.split(/\s+/);
    if (columns.length < 3) {
      return err(new MetadataError(`Line ${index + 1} of ${source} has fewer than 3 columns`, source));
    }
    const token = columns[2];
    tokens.push(relabel[token] ?? token);
  }
  return ok(tokens);
}

function siblingPath(audioPath: string, extension: string): string {
  return audioPath.slice(0, audioPath.length - path.extname(audioPath).length) + extension;
}

async function readTokenFile(
  filePath: string,
  audioPath: string,
  relabel?: Readonly<Record<string, string>>
): Promise<Result<string[], MetadataError>> {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf8");
  } catch (error) {
    return err(new MetadataError(`Cannot read ${filePath}`, audioPath, { cause: error }));
  }
  return parseAlignedTokens(text, filePath, relabel);
}

export const timitReader: UtteranceReader = {
  audioType: "wav",

  identify(audioPath: string): UtteranceIdentity {
    const speakerId = path.basename(path.dirname(audioPath));
    const stem = path.basename(audioPath, path.extname(audioPath));
    return { id: `${speakerId}_${stem}`, speakerId };
  },

  async readMetadata(audioPath: string): Promise<Result<ManifestField[], MetadataError>> {
    const phonemes = await readTokenFile(siblingPath(audioPath, ".phn"), audioPath, PHONEME_RELABEL);
    if (!phonemes.ok) return phonemes;
    const words = await readTokenFile(siblingPath(audioPath, ".wrd"), audioPath);
    if (!words.ok) return words;

    const fields: ManifestField[] = [
      { key: "phn", payload: joinTokens(phonemes.value), type: "string" },
      { key: "wrd", payload: joinTokens(words.value), type: "string" }
    ];
    return ok(fields);
  }
};

export const timitAdapter: CorpusAdapter = {
  discovery(dataFolder: string, split: string): SplitDiscovery {
    if (!isTimitSplit(split)) {
      throw new Error(`Unknown TIMIT split: ${split}`);
    }
    return { root: dataFolder, filter: timitSplitFilter(split) };
  },

  async createReader(): Promise<UtteranceReader> {
    return timitReader;
  }
};
