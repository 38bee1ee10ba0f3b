export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Logging interface handed to every pipeline step.
 *
 * One instance is created per run and passed down explicitly; steps scope it
 * with `child()` instead of threading their own context through messages.
 *
 * @example
 * ```typescript
 * const logger = new ConsoleLogger("info");
 * const splitLogger = logger.child({ corpus: "timit", split: "dev" });
 * splitLogger.info("Creating manifest");
 * // [corpus=timit split=dev] Creating manifest
 * ```
 */
export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  /**
   * @param message - Optional context printed before the error
   */
  error(error: Error, message?: string): void;
  child(bindings: Record<string, unknown>): Logger;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class ConsoleLogger implements Logger {
  private readonly threshold: number;

  constructor(level: LogLevel = "info") {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string): void {
    if (this.enabled("debug")) console.debug(message);
  }

  info(message: string): void {
    if (this.enabled("info")) console.info(message);
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.warn(message);
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(`${message}: ${error.message}`);
    } else {
      console.error(error.message);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this, bindings);
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly base: Logger,
    private readonly bindings: Record<string, unknown>
  ) {}

  debug(message: string): void {
    this.base.debug(this.withPrefix(message));
  }

  info(message: string): void {
    this.base.info(this.withPrefix(message));
  }

  warn(message: string): void {
    this.base.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    this.base.error(error, this.withPrefix(message ?? error.name));
  }

  child(bindings: Record<string, unknown>): Logger {
    return new ScopedLogger(this.base, { ...this.bindings, ...bindings });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(" ");
    return prefix ? `[${prefix}] ${message}` : message;
  }
}

/** Discards everything. */
export class SilentLogger implements Logger {
  debug(): void {}
  info(): void {}
  warn(): void {}
  error(): void {}
  child(): Logger {
    return this;
  }
}
