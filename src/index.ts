export { shouldSkip, saveFingerprint, fingerprintDigest } from "./cache/fingerprint";
export { resolveCorpusConfig, resolveStageConfig } from "./config/corpusConfig";
export type { CorpusConfig, CorpusKind, LibrispeechConfig, StageConfig, TimitConfig } from "./config/corpusConfig";
export { loadCorpusConfig, loadStageConfig } from "./config/loader";
export { validateCorpusRoot } from "./corpora/validators";
export { discoverFiles, matchesFilter } from "./discovery/discoverFiles";
export type { FileFilter } from "./discovery/discoverFiles";
export * from "./errors/appError";
export { ok, err } from "./errors/result";
export type { Result } from "./errors/result";
export { SpawnShellRunner } from "./exec/shell";
export type { ShellRunner, ShellResult } from "./exec/shell";
export { readSampleCount, audioDuration } from "./audio/sampleCount";
export { loadLabelStore } from "./labels/labelStore";
export type { LabelStore } from "./labels/labelStore";
export { ConsoleLogger, SilentLogger } from "./logging/logger";
export type { Logger, LogLevel } from "./logging/logger";
export { buildManifest } from "./manifest/builder";
export type { UtteranceReader, LabelSource } from "./manifest/builder";
export { formatRecord } from "./manifest/format";
export { writeManifest } from "./manifest/writer";
export { stageDataset } from "./staging/stageDataset";
export type { StageReport } from "./staging/stageDataset";
export { prepareCorpus, runPrepare } from "./commands/prepare";
export { stageCorpus, runStage } from "./commands/stage";
export type { ManifestRecord, ManifestField } from "./types/manifestRecord";
