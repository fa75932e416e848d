import { describe, expect, it } from "vitest";
import { VerbosityError } from "../src/errors.js";
import { createLogger, formatPlain, resolveLogLevel, setupLogging } from "../src/output.js";

describe("resolveLogLevel", () => {
  it("maps -v counts to levels", () => {
    expect(resolveLogLevel(0)).toBe("warn");
    expect(resolveLogLevel(1)).toBe("info");
    expect(resolveLogLevel(2)).toBe("debug");
  });

  it.each([3, 4, 10, -1])("rejects a count of %i", (count) => {
    expect(() => resolveLogLevel(count)).toThrow(VerbosityError);
  });
});

describe("createLogger", () => {
  it("drops messages below the level", () => {
    const lines: string[] = [];
    const logger = createLogger("info", (line) => lines.push(line));
    logger.debug("hidden");
    logger.info("shown");
    logger.warn("careful");
    logger.error("failed");
    expect(lines).toEqual(["INFO: shown\n", "WARNING: careful\n", "failed\n"]);
  });

  it("logs everything at debug", () => {
    const lines: string[] = [];
    const logger = setupLogging(2, (line) => lines.push(line));
    logger.debug("details");
    expect(lines).toEqual(["DEBUG: details\n"]);
  });

  it("keeps only warnings by default", () => {
    const lines: string[] = [];
    const logger = setupLogging(0, (line) => lines.push(line));
    logger.info("quiet");
    logger.warn("loud");
    expect(lines).toEqual(["WARNING: loud\n"]);
  });
});

describe("formatPlain", () => {
  it("pretty prints objects with a trailing newline", () => {
    expect(formatPlain({ a: 1 })).toBe('{\n  "a": 1\n}\n');
    expect(formatPlain("done")).toBe("done\n");
  });
});
