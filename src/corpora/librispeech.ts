import { promises as fs } from "fs";
import path from "path";
import { discoverFiles } from "../discovery/discoverFiles";
import { MetadataError } from "../errors/appError";
import { Result, err, ok } from "../errors/result";
import { UtteranceIdentity, UtteranceReader } from "../manifest/builder";
import { joinTokens } from "../manifest/format";
import { ManifestField } from "../types/manifestRecord";
import { CorpusAdapter, SplitDiscovery } from "./types";

const AUDIO_EXTENSION = ".flac";
const TRANSCRIPT_SUFFIX = "trans.txt";

/**
 * Parses `<speaker>-<chapter>.trans.txt` content: one `<utterance-id> WORD WORD ...`
 * per line. Words come back already joined with `_`.
 */
export function parseTranscripts(text: string, into: Map<string, string> = new Map()): Map<string, string> {
  for (const line of text.split(/\r?\n/)) {
    const [id, ...words] = line.trim().split(/\s+/);
    if (!id) continue;
    into.set(id, joinTokens(words));
  }
  return into;
}

export async function loadTranscripts(files: readonly string[]): Promise<Map<string, string>> {
  const transcripts = new Map<string, string>();
  for (const file of files) {
    parseTranscripts(await fs.readFile(file, "utf8"), transcripts);
  }
  return transcripts;
}

/** `84-121123-0000.flac` belongs to speaker `84-121123` (speaker and chapter). */
export function identifyLibrispeech(audioPath: string): UtteranceIdentity {
  const id = path.basename(audioPath, AUDIO_EXTENSION);
  const speakerId = id.split("-").slice(0, 2).join("-");
  return { id, speakerId };
}

export function createLibrispeechReader(transcripts: ReadonlyMap<string, string>): UtteranceReader {
  return {
    audioType: "flac",
    identify: identifyLibrispeech,

    async readMetadata(audioPath: string, identity: UtteranceIdentity): Promise<Result<ManifestField[], MetadataError>> {
      const words = transcripts.get(identity.id);
      if (words === undefined) {
        return err(new MetadataError(`No transcript line for ${identity.id}`, audioPath));
      }
      const fields: ManifestField[] = [{ key: "wrd", payload: words, type: "string" }];
      return ok(fields);
    }
  };
}

export const librispeechAdapter: CorpusAdapter = {
  discovery(dataFolder: string, split: string): SplitDiscovery {
    return { root: path.join(dataFolder, split), filter: { requireAll: [AUDIO_EXTENSION] } };
  },

  async createReader(dataFolder: string, split: string): Promise<UtteranceReader> {
    const transcriptFiles = await discoverFiles(path.join(dataFolder, split), {
      requireAll: [TRANSCRIPT_SUFFIX]
    });
    return createLibrispeechReader(await loadTranscripts(transcriptFiles));
  }
};
