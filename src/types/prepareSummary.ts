export interface SplitSummary {
  split: string;
  manifest_path: string;
  records: number;
  examined: number;
  missing_labels: number;
  metadata_defects: number;
  label_dir: string | null;
}

export interface PrepareSummary {
  schema_version: "1.0";
  corpus: "timit" | "librispeech";
  save_folder: string;
  /** True when the previous build was still valid and nothing was rebuilt. */
  skipped: boolean;
  started_at: string;
  ended_at: string;
  splits: SplitSummary[];
}
