import { describe, expect, it } from "vitest";
import { ManifestFormatError } from "../src/errors/appError";
import { formatDuration, formatRecord, joinTokens } from "../src/manifest/format";

describe("manifest format", () => {
  it("writes ID, duration and typed fields in order", () => {
    const line = formatRecord({
      id: "mabc0_si100",
      duration: 2.9248125,
      fields: [
        { key: "wav", payload: "/data/timit/train/dr1/mabc0/si100.wav", type: "wav" },
        { key: "spk_id", payload: "mabc0", type: "string" },
        { key: "phn", payload: "sil_b_ae_sil", type: "string" },
        { key: "wrd", payload: "bad_cat", type: "string" }
      ]
    });

    expect(line).toBe(
      "ID=mabc0_si100 duration=2.9248125 wav=(/data/timit/train/dr1/mabc0/si100.wav,wav) " +
        "spk_id=(mabc0,string) phn=(sil_b_ae_sil,string) wrd=(bad_cat,string)"
    );
  });

  it("keeps a trailing .0 on whole-second durations", () => {
    expect(formatDuration(3)).toBe("3.0");
    expect(formatDuration(0.1)).toBe("0.1");
  });

  it("joins tokens with underscores", () => {
    expect(joinTokens(["she", "had", "your"])).toBe("she_had_your");
    expect(joinTokens(["new york", "city"])).toBe("new_york_city");
    expect(joinTokens([])).toBe("");
  });

  it("refuses payloads that would break the line format", () => {
    const record = (payload: string) => ({
      id: "u1",
      duration: 1,
      fields: [{ key: "wav", payload, type: "wav" as const }]
    });

    expect(() => formatRecord(record("/data/my corpus/u1.wav"))).toThrow(ManifestFormatError);
    expect(() => formatRecord(record("/data/a,b/u1.wav"))).toThrow(ManifestFormatError);
  });
});
