import { statSync } from "fs";
import { z } from "zod";
import { ConfigError } from "../errors/appError";

function statKind(target: string): "file" | "directory" | null {
  try {
    const stats = statSync(target);
    if (stats.isDirectory()) return "directory";
    return stats.isFile() ? "file" : null;
  } catch {
    return null;
  }
}

/** A path that must name an existing directory. */
export function directoryOption() {
  return z
    .string()
    .min(1)
    .refine((value) => statKind(value) === "directory", {
      message: "directory does not exist"
    });
}

/** A path that must name an existing regular file. */
export function fileOption() {
  return z
    .string()
    .min(1)
    .refine((value) => statKind(value) === "file", { message: "file does not exist" });
}

/**
 * A non-empty list drawn from `values`. Accepts an array or a comma-separated
 * string; duplicates are dropped, first occurrence wins.
 */
export function enumListOption<T extends string>(values: readonly [T, ...T[]]) {
  return z.preprocess(
    (raw) =>
      typeof raw === "string"
        ? raw
            .split(",")
            .map((item) => item.trim())
            .filter(Boolean)
        : raw,
    z
      .array(z.enum(values))
      .min(1)
      .transform((items) => Array.from(new Set(items)))
  );
}

/** A list of integers within `[min, max]`. */
export function boundedIntListOption(min: number, max: number = Number.MAX_SAFE_INTEGER) {
  return z.array(z.number().int().min(min).max(max)).min(1);
}

export function ratioOption(defaultValue: number) {
  return z.number().min(0).max(1).default(defaultValue);
}

function deepFreeze<T>(value: T): Readonly<T> {
  if (value !== null && typeof value === "object") {
    for (const key of Object.keys(value)) {
      deepFreeze(Reflect.get(value, key));
    }
    Object.freeze(value);
  }
  return value;
}

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
}

/**
 * Validates `raw` against `schema`, applying defaults. The returned value is
 * frozen. Every invalid option is named in the thrown {@link ConfigError}.
 */
export function resolveConfig<S extends z.ZodTypeAny>(
  schema: S,
  raw: unknown,
  label = "configuration"
): Readonly<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid ${label}: ${issues.join("; ")}`, { details: { issues } });
  }
  const data: z.output<S> = parsed.data;
  return deepFreeze(data);
}
