import { describe, expect, it } from "vitest";
import { HeatmapError, formatCivilDate, isHeatmapError, parseWeekday } from "./index.js";

describe("parseWeekday", () => {
  it("accepts full names and three-letter abbreviations in any case", () => {
    expect(parseWeekday("Monday")).toBe("monday");
    expect(parseWeekday(" sun ")).toBe("sunday");
    expect(parseWeekday("SAT")).toBe("saturday");
  });

  it("returns null for unknown names", () => {
    expect(parseWeekday("mo")).toBeNull();
    expect(parseWeekday("funday")).toBeNull();
  });
});

describe("HeatmapError", () => {
  it("carries kind, stage and details", () => {
    const error = new HeatmapError("invalid_range", "calendar_grid_builder", "range start is after range end", {
      rangeStart: "2024-02-01",
      rangeEnd: "2024-01-01",
    });

    expect(isHeatmapError(error)).toBe(true);
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("HeatmapError");
    expect(error.kind).toBe("invalid_range");
    expect(error.stage).toBe("calendar_grid_builder");
    expect(error.details).toEqual({ rangeStart: "2024-02-01", rangeEnd: "2024-01-01" });
  });

  it("is not confused with plain errors", () => {
    expect(isHeatmapError(new Error("boom"))).toBe(false);
  });
});

describe("formatCivilDate", () => {
  it("zero-pads every part", () => {
    expect(formatCivilDate({ year: 2024, month: 3, day: 9 })).toBe("2024-03-09");
    expect(formatCivilDate({ year: 99, month: 12, day: 31 })).toBe("0099-12-31");
  });
});
