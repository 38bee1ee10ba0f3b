import { FileFilter } from "../discovery/discoverFiles";
import { UtteranceReader } from "../manifest/builder";

/** Where a split's audio lives and which files belong to it. */
export interface SplitDiscovery {
  root: string;
  filter: FileFilter;
}

/** Layout and naming conventions of one corpus. */
export interface CorpusAdapter {
  discovery(dataFolder: string, split: string): SplitDiscovery;
  createReader(dataFolder: string, split: string): Promise<UtteranceReader>;
}
