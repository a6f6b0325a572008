import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, getLogLevel, parseLevel, setLogLevel } from "./logger.js";

describe("createLogger", () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
  });

  it("prefixes messages with the scope", () => {
    setLogLevel("info");
    const info = vi.spyOn(console, "log").mockImplementation(() => {});

    createLogger("hn").info("Fetched 3 stories");

    expect(info).toHaveBeenCalledWith("[hn]", "Fetched 3 stories");
  });

  it("drops messages below the level", () => {
    setLogLevel("warn");
    const info = vi.spyOn(console, "log").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const log = createLogger("pipeline");

    log.info("hidden");
    log.warn("shown");

    expect(info).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith("[pipeline]", "shown");
  });
});

describe("parseLevel", () => {
  it("accepts known levels in any case", () => {
    expect(parseLevel("DEBUG")).toBe("debug");
    expect(parseLevel("verbose")).toBeUndefined();
    expect(parseLevel(undefined)).toBeUndefined();
  });
});
