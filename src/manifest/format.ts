import { ManifestFormatError } from "../errors/appError";
import { ManifestField, ManifestRecord } from "../types/manifestRecord";

const RESERVED_IN_PAYLOAD = /[\s(),]/;

/** Joins words or phonemes into one whitespace-free token. */
export function joinTokens(tokens: readonly string[]): string {
  return tokens.map((token) => token.replace(/\s+/g, "_")).join("_");
}

/** Prints like the original manifests: integral values keep a trailing `.0`. */
export function formatDuration(seconds: number): string {
  return Number.isInteger(seconds) ? `${seconds}.0` : String(seconds);
}

function formatField(field: ManifestField, id: string): string {
  if (RESERVED_IN_PAYLOAD.test(field.payload)) {
    throw new ManifestFormatError(
      `Field ${field.key} of ${id} contains whitespace or a reserved character: ${field.payload}`,
      { details: { id, key: field.key } }
    );
  }
  return `${field.key}=(${field.payload},${field.type})`;
}

export function formatRecord(record: ManifestRecord): string {
  if (RESERVED_IN_PAYLOAD.test(record.id)) {
    throw new ManifestFormatError(`Utterance id contains a reserved character: ${record.id}`);
  }
  const tokens = [`ID=${record.id}`, `duration=${formatDuration(record.duration)}`];
  for (const field of record.fields) {
    tokens.push(formatField(field, record.id));
  }
  return tokens.join(" ");
}
