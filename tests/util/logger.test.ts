import { afterEach, describe, expect, it, vi } from "vitest";
import { createLogger, isLogLevel, resolveLogLevel } from "../../src/util/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("logger", () => {
  it("recognizes levels", () => {
    expect(isLogLevel("warn")).toBe(true);
    expect(isLogLevel("toString")).toBe(false);
    expect(isLogLevel(3)).toBe(false);
  });

  it("reads the level from the environment", () => {
    expect(resolveLogLevel({ EDAPARSE_LOG_LEVEL: " DEBUG " })).toBe("debug");
    expect(resolveLogLevel({ EDAPARSE_LOG_LEVEL: "loud" })).toBe("info");
    expect(resolveLogLevel({})).toBe("info");
  });

  it("filters below the threshold", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const debug = vi.spyOn(console, "debug").mockImplementation(() => {});
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    const logger = createLogger("test", "info");
    logger.debug("hidden");
    logger.info("shown");
    logger.warn("also shown");

    expect(debug).not.toHaveBeenCalled();
    expect(log).toHaveBeenCalledTimes(1);
    expect(String(log.mock.calls[0]?.[0])).toContain("[edaparse:test]");
    expect(String(log.mock.calls[0]?.[0])).toContain("shown");
    expect(warn).toHaveBeenCalledTimes(1);
  });
});
