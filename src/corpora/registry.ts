import { CorpusKind } from "../config/corpusConfig";
import { librispeechAdapter } from "./librispeech";
import { timitAdapter } from "./timit";
import { CorpusAdapter } from "./types";

const ADAPTERS: Record<CorpusKind, CorpusAdapter> = {
  timit: timitAdapter,
  librispeech: librispeechAdapter
};

export function corpusAdapterFor(kind: CorpusKind): CorpusAdapter {
  return ADAPTERS[kind];
}
