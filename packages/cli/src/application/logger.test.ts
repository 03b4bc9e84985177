import { describe, expect, it } from "vitest";
import { createStderrLogger, parseLogLevel } from "./logger.js";

describe("createStderrLogger", () => {
  it("drops messages above the configured level", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("warn", (line) => lines.push(line));

    logger.error("git failed");
    logger.warn("skipped 2 records");
    logger.info("loading history");
    logger.debug("details");

    expect(lines).toEqual(["[commitgrid] ERROR git failed", "[commitgrid] WARN skipped 2 records"]);
  });

  it("writes nothing when silent", () => {
    const lines: string[] = [];
    const logger = createStderrLogger("silent", (line) => lines.push(line));

    logger.error("git failed");

    expect(lines).toEqual([]);
  });
});

describe("parseLogLevel", () => {
  it("falls back to info for missing or unknown values", () => {
    expect(parseLogLevel("DEBUG")).toBe("debug");
    expect(parseLogLevel(undefined)).toBe("info");
    expect(parseLogLevel("verbose")).toBe("info");
  });
});
