import path from "path";
import { CorpusKind } from "../config/corpusConfig";
import { StructureError } from "../errors/appError";
import { isDirectory } from "../utils/fs";

const CORPUS_NAMES: Record<CorpusKind, string> = {
  timit: "TIMIT",
  librispeech: "LibriSpeech"
};

/** Sub-paths a corpus root must contain, in the order they are checked. */
export function expectedCorpusPaths(root: string, kind: CorpusKind, splits: readonly string[]): string[] {
  switch (kind) {
    case "timit":
      return [path.join(root, "test", "dr1"), path.join(root, "train", "dr1")];
    case "librispeech":
      return splits.map((split) => path.join(root, split));
  }
}

/**
 * Fails with a {@link StructureError} naming the first expected sub-path
 * missing under `root`.
 */
export async function validateCorpusRoot(
  root: string,
  kind: CorpusKind,
  splits: readonly string[]
): Promise<void> {
  for (const expected of expectedCorpusPaths(root, kind, splits)) {
    if (!(await isDirectory(expected))) {
      throw new StructureError(
        `The folder ${expected} does not exist (it is expected in the ${CORPUS_NAMES[kind]} dataset)`,
        expected
      );
    }
  }
}
