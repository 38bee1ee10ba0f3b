import path from "path";
import { CorpusKind } from "../config/corpusConfig";

export function manifestPath(saveFolder: string, split: string): string {
  return path.join(saveFolder, `${split}.scp`);
}

export function fingerprintPath(saveFolder: string, kind: CorpusKind): string {
  return path.join(saveFolder, `opt_${kind}_prepare.json`);
}

export function labelArtifactDir(saveFolder: string): string {
  return path.join(saveFolder, "kaldi_labels");
}

export function prepareSummaryPath(saveFolder: string): string {
  return path.join(saveFolder, "prepare_summary.json");
}
