/**
 * Error codes raised by the preparation pipeline.
 * User-correctable errors exit with code 2, runtime errors with code 1.
 */
export type ErrorCode =
  // User-correctable (exit code 2)
  | "ConfigError"
  | "StructureError"
  // Runtime (exit code 1)
  | "MetadataError"
  | "LabelSourceError"
  | "LabelThresholdError"
  | "StagingError"
  | "AudioFormatError"
  | "ManifestFormatError"
  | "PrepareError";

export interface AppErrorOptions {
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error the pipeline raises on purpose.
 *
 * @example
 * ```typescript
 * throw new StructureError("Missing /data/timit/test/dr1", {
 *   details: { missingPath: "/data/timit/test/dr1" }
 * });
 * ```
 */
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;
  public readonly cause?: unknown;

  constructor(code: ErrorCode, message: string, options: AppErrorOptions = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.details = options.details;
    this.cause = options.cause;
  }
}

/** An option is missing, mistyped or outside its declared domain. */
export class ConfigError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ConfigError", message, options);
  }
}

/** The corpus root lacks a sub-path the corpus layout requires. */
export class StructureError extends AppError {
  public readonly missingPath: string;

  constructor(message: string, missingPath: string, options: AppErrorOptions = {}) {
    super("StructureError", message, { ...options, details: { ...options.details, missingPath } });
    this.missingPath = missingPath;
  }
}

/**
 * A sibling metadata file (transcript, phoneme file) is absent or unreadable.
 * Non-fatal: the utterance is dropped.
 */
export class MetadataError extends AppError {
  public readonly utterancePath: string;

  constructor(message: string, utterancePath: string, options: AppErrorOptions = {}) {
    super("MetadataError", message, options);
    this.utterancePath = utterancePath;
  }
}

export class LabelSourceError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("LabelSourceError", message, options);
  }
}

/** Too many utterances of a split have no entry in the label source. */
export class LabelThresholdError extends AppError {
  public readonly missing: number;
  public readonly total: number;
  public readonly limit: number;

  constructor(missing: number, total: number, limit: number, labelDir: string) {
    super(
      "LabelThresholdError",
      `${missing} of ${total} utterances have no label in ${labelDir} ` +
        `(ratio ${(missing / total).toFixed(4)} exceeds limit ${limit})`,
      { details: { missing, total, limit, labelDir } }
    );
    this.missing = missing;
    this.total = total;
    this.limit = limit;
  }
}

/** A copy or decompress command failed. */
export class StagingError extends AppError {
  public readonly archive: string;
  public readonly exitCode: number | null;

  constructor(
    message: string,
    archive: string,
    exitCode: number | null,
    options: AppErrorOptions = {}
  ) {
    super("StagingError", message, { ...options, details: { ...options.details, archive, exitCode } });
    this.archive = archive;
    this.exitCode = exitCode;
  }
}

export class AudioFormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("AudioFormatError", message, options);
  }
}

export class ManifestFormatError extends AppError {
  constructor(message: string, options: AppErrorOptions = {}) {
    super("ManifestFormatError", message, options);
  }
}

/** One or more splits failed; carries each split's error. */
export class PrepareError extends AppError {
  public readonly failures: ReadonlyArray<{ split: string; error: Error }>;

  constructor(failures: Array<{ split: string; error: Error }>) {
    const summary = failures.map((f) => `${f.split}: ${f.error.message}`).join("; ");
    super("PrepareError", `Manifest preparation failed for ${failures.length} split(s): ${summary}`);
    this.failures = failures;
  }
}

const USER_CORRECTABLE: ReadonlySet<ErrorCode> = new Set<ErrorCode>(["ConfigError", "StructureError"]);

export function exitCodeFor(error: unknown): number {
  if (error instanceof AppError && USER_CORRECTABLE.has(error.code)) {
    return 2;
  }
  return 1;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}
