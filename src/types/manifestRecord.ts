/** Type tag written after a field payload, e.g. `wav=(/a/b.wav,wav)`. */
export type FieldType = "wav" | "flac" | "string" | "json";

export interface ManifestField {
  key: string;
  payload: string;
  type: FieldType;
}

export interface ManifestRecord {
  id: string;
  /** Seconds. */
  duration: number;
  /** Audio field first, then `spk_id`, then corpus-specific fields. */
  fields: ManifestField[];
}

export interface ManifestBuildResult {
  records: ManifestRecord[];
  /** Files examined before `selectN` stopped the build. */
  examined: number;
  missingLabels: number;
  metadataDefects: number;
}
