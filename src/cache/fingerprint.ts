import { z } from "zod";
import { pathExists, readJson, writeJson } from "../utils/fs";
import { canonicalJson, sha256 } from "../utils/hash";

const FingerprintFileSchema = z.object({
  schema_version: z.literal("1.0"),
  digest: z.string(),
  config: z.unknown()
});

export type FingerprintFile = z.infer<typeof FingerprintFileSchema>;

export function fingerprintDigest(config: unknown): string {
  return sha256(canonicalJson(config));
}

async function loadFingerprint(fingerprintPath: string): Promise<FingerprintFile | null> {
  try {
    const parsed = FingerprintFileSchema.safeParse(await readJson(fingerprintPath));
    return parsed.success ? parsed.data : null;
  } catch {
    // Unreadable or corrupt: same as no fingerprint.
    return null;
  }
}

/**
 * True when every expected output exists and the stored configuration is
 * structurally equal to `currentConfig`.
 */
export async function shouldSkip(
  expectedOutputs: Iterable<string>,
  fingerprintPath: string,
  currentConfig: unknown
): Promise<boolean> {
  for (const output of expectedOutputs) {
    if (!(await pathExists(output))) return false;
  }

  const stored = await loadFingerprint(fingerprintPath);
  if (!stored) return false;

  return canonicalJson(stored.config) === canonicalJson(currentConfig);
}

/** Call only after every output of the build has been written. */
export async function saveFingerprint(fingerprintPath: string, config: unknown): Promise<void> {
  const file: FingerprintFile = {
    schema_version: "1.0",
    digest: fingerprintDigest(config),
    config
  };
  await writeJson(fingerprintPath, file);
}
