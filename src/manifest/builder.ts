import { audioDuration } from "../audio/sampleCount";
import { LabelThresholdError, ManifestFormatError, MetadataError } from "../errors/appError";
import { Result } from "../errors/result";
import { LABEL_ARTIFACT_TYPE, LabelStore, labelArtifactPath, saveLabelArtifact } from "../labels/labelStore";
import { Logger } from "../logging/logger";
import {
  FieldType,
  ManifestBuildResult,
  ManifestField,
  ManifestRecord
} from "../types/manifestRecord";

export const DEFAULT_LABEL_MISSING_RATIO_LIMIT = 0.05;

export interface UtteranceIdentity {
  id: string;
  speakerId: string;
}

/** Corpus-specific naming and metadata conventions. */
export interface UtteranceReader {
  audioType: FieldType;
  identify(audioPath: string): UtteranceIdentity;
  /** Fields written after `spk_id`, or the reason they cannot be read. */
  readMetadata(audioPath: string, identity: UtteranceIdentity): Promise<Result<ManifestField[], MetadataError>>;
}

export interface LabelSource {
  store: LabelStore;
  /** Where the alignments came from; named in threshold errors. */
  sourceDir: string;
  /** Where per-utterance label artifacts are written. */
  artifactDir: string;
}

export interface ManifestBuildOptions {
  sampleRate: number;
  labels?: LabelSource;
  labelMissingRatioLimit?: number;
  /** Stop after emitting this many records. */
  selectN?: number;
  durationOf?: (audioPath: string, sampleRate: number) => Promise<number>;
}

/**
 * Turns discovered audio files into manifest records, in input order.
 *
 * Utterances without a label (when a label source is given) or with missing
 * metadata are left out. Once every file is examined, a missing-label ratio
 * above `labelMissingRatioLimit` throws {@link LabelThresholdError} before any
 * label artifact is written.
 */
export async function buildManifest(
  files: readonly string[],
  reader: UtteranceReader,
  options: ManifestBuildOptions,
  logger: Logger
): Promise<ManifestBuildResult> {
  const durationOf = options.durationOf ?? audioDuration;
  const limit = options.labelMissingRatioLimit ?? DEFAULT_LABEL_MISSING_RATIO_LIMIT;
  const records: ManifestRecord[] = [];
  let examined = 0;
  let missingLabels = 0;
  let metadataDefects = 0;
  const seen = new Set<string>();
  const pendingLabels: Array<{ id: string; labels: readonly number[] }> = [];

  for (const audioPath of files) {
    if (options.selectN !== undefined && records.length >= options.selectN) break;
    examined += 1;

    const identity = reader.identify(audioPath);
    if (seen.has(identity.id)) {
      throw new ManifestFormatError(`Duplicate utterance id ${identity.id} at ${audioPath}`, {
        details: { id: identity.id }
      });
    }
    seen.add(identity.id);

    let labels: readonly number[] | undefined;
    if (options.labels) {
      labels = options.labels.store.get(identity.id);
      if (!labels) {
        missingLabels += 1;
        logger.debug(`Utterance ${identity.id} has no label in ${options.labels.sourceDir}`);
        continue;
      }
    }

    const metadata = await reader.readMetadata(audioPath, identity);
    if (!metadata.ok) {
      metadataDefects += 1;
      logger.error(metadata.error, `Dropping utterance ${identity.id}`);
      continue;
    }

    const fields: ManifestField[] = [
      { key: "wav", payload: audioPath, type: reader.audioType },
      { key: "spk_id", payload: identity.speakerId, type: "string" },
      ...metadata.value
    ];

    const duration = await durationOf(audioPath, options.sampleRate);

    if (options.labels && labels) {
      pendingLabels.push({ id: identity.id, labels });
      fields.push({
        key: "kaldi_lab",
        payload: labelArtifactPath(options.labels.artifactDir, identity.id),
        type: LABEL_ARTIFACT_TYPE
      });
    }

    records.push({ id: identity.id, duration, fields });
  }

  if (options.labels && examined > 0 && missingLabels / examined > limit) {
    throw new LabelThresholdError(missingLabels, examined, limit, options.labels.sourceDir);
  }

  if (missingLabels > 0) {
    logger.warn(`${missingLabels} of ${examined} utterances had no label and were left out`);
  }

  // Artifacts are written only for a split that passed the threshold.
  if (options.labels) {
    for (const pending of pendingLabels) {
      await saveLabelArtifact(options.labels.artifactDir, pending.id, pending.labels);
    }
  }

  return { records, examined, missingLabels, metadataDefects };
}
