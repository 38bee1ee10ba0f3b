import { PrepareSummary, SplitSummary } from "../types/prepareSummary";
import { writeJson } from "../utils/fs";
import { prepareSummaryPath } from "./paths";

export interface PrepareSummaryParams {
  corpus: PrepareSummary["corpus"];
  saveFolder: string;
  skipped: boolean;
  startedAt: string;
  endedAt: string;
  splits: SplitSummary[];
}

export function buildPrepareSummary(params: PrepareSummaryParams): PrepareSummary {
  return {
    schema_version: "1.0",
    corpus: params.corpus,
    save_folder: params.saveFolder,
    skipped: params.skipped,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    splits: params.splits
  };
}

export async function writePrepareSummary(summary: PrepareSummary): Promise<void> {
  await writeJson(prepareSummaryPath(summary.save_folder), summary);
}
