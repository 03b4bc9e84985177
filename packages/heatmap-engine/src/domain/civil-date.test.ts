import { describe, expect, it } from "vitest";
import fc from "fast-check";
import {
  addDays,
  civilDateFromUnixSeconds,
  daysBetween,
  daysInMonth,
  formatCivilDate,
  fromDayNumber,
  isValidCivilDate,
  parseCivilDate,
  toDayNumber,
  weekdayOf,
} from "./civil-date.js";

describe("civil date arithmetic", () => {
  it("counts days from the unix epoch", () => {
    expect(toDayNumber({ year: 1970, month: 1, day: 1 })).toBe(0);
    expect(toDayNumber({ year: 2024, month: 1, day: 1 })).toBe(19_723);
    expect(toDayNumber({ year: 1969, month: 12, day: 31 })).toBe(-1);
    expect(fromDayNumber(19_723)).toEqual({ year: 2024, month: 1, day: 1 });
  });

  it("handles leap days and century rules", () => {
    expect(daysInMonth(2024, 2)).toBe(29);
    expect(daysInMonth(2023, 2)).toBe(28);
    expect(daysInMonth(1900, 2)).toBe(28);
    expect(daysInMonth(2000, 2)).toBe(29);
    expect(addDays({ year: 2024, month: 2, day: 28 }, 1)).toEqual({ year: 2024, month: 2, day: 29 });
    expect(addDays({ year: 2023, month: 2, day: 28 }, 1)).toEqual({ year: 2023, month: 3, day: 1 });
    expect(addDays({ year: 2024, month: 12, day: 31 }, 1)).toEqual({ year: 2025, month: 1, day: 1 });
    expect(daysBetween({ year: 2024, month: 1, day: 1 }, { year: 2025, month: 1, day: 1 })).toBe(366);
  });

  it("resolves weekdays", () => {
    expect(weekdayOf({ year: 1970, month: 1, day: 1 })).toBe("thursday");
    expect(weekdayOf({ year: 2024, month: 1, day: 1 })).toBe("monday");
    expect(weekdayOf({ year: 2024, month: 2, day: 29 })).toBe("thursday");
    expect(weekdayOf({ year: 2000, month: 2, day: 29 })).toBe("tuesday");
  });

  it("maps unix seconds to UTC dates, including before the epoch", () => {
    expect(civilDateFromUnixSeconds(0)).toEqual({ year: 1970, month: 1, day: 1 });
    expect(civilDateFromUnixSeconds(-1)).toEqual({ year: 1969, month: 12, day: 31 });
    expect(civilDateFromUnixSeconds(1_704_153_599)).toEqual({ year: 2024, month: 1, day: 1 });
    expect(civilDateFromUnixSeconds(1_704_153_600)).toEqual({ year: 2024, month: 1, day: 2 });
  });

  it("round-trips day numbers through civil dates", () => {
    fc.assert(
      fc.property(fc.integer({ min: -800_000, max: 800_000 }), (dayNumber) => {
        const date = fromDayNumber(dayNumber);
        expect(isValidCivilDate(date)).toBe(true);
        expect(toDayNumber(date)).toBe(dayNumber);
      }),
    );
  });
});

describe("parseCivilDate", () => {
  it("parses ISO calendar dates", () => {
    expect(parseCivilDate("2024-02-29")).toEqual({ year: 2024, month: 2, day: 29 });
    expect(formatCivilDate({ year: 812, month: 3, day: 7 })).toBe("0812-03-07");
  });

  it("rejects malformed and impossible dates", () => {
    expect(parseCivilDate("2023-02-29")).toBeNull();
    expect(parseCivilDate("2024-13-01")).toBeNull();
    expect(parseCivilDate("2024-1-01")).toBeNull();
    expect(parseCivilDate("yesterday")).toBeNull();
  });
});
