import { afterEach, describe, expect, it, vi } from "vitest";
import { ConsoleLogger, isLogLevel } from "../src/logging/logger";

describe("ConsoleLogger", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("drops messages below its level", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("warn");

    logger.debug("hidden");
    logger.warn("shown");

    expect(debug).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("shown");
  });

  it("prefixes child loggers with their bindings", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const logger = new ConsoleLogger("info").child({ corpus: "timit" }).child({ split: "dev" });

    logger.info("Creating manifest");
    logger.error(new Error("boom"), "Manifest build failed");

    expect(info).toHaveBeenCalledWith("[corpus=timit split=dev] Creating manifest");
    expect(error).toHaveBeenCalledWith("[corpus=timit split=dev] Manifest build failed: boom");
  });

  it("recognises level names", () => {
    expect(isLogLevel("debug")).toBe(true);
    expect(isLogLevel("verbose")).toBe(false);
  });
});
