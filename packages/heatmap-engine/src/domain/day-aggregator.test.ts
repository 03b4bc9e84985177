import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { aggregateDayCounts, totalCount } from "./day-aggregator.js";
import { fromDayNumber } from "./civil-date.js";

describe("aggregateDayCounts", () => {
  it("accumulates duplicate dates", () => {
    const counts = aggregateDayCounts([
      { year: 2024, month: 1, day: 1 },
      { year: 2024, month: 1, day: 8 },
      { year: 2024, month: 1, day: 1 },
      { year: 2024, month: 1, day: 1 },
    ]);

    expect([...counts.entries()]).toEqual([
      ["2024-01-01", { date: { year: 2024, month: 1, day: 1 }, count: 3 }],
      ["2024-01-08", { date: { year: 2024, month: 1, day: 8 }, count: 1 }],
    ]);
  });

  it("returns an empty mapping for no dates", () => {
    expect(aggregateDayCounts([]).size).toBe(0);
  });

  it("conserves the number of commits", () => {
    fc.assert(
      fc.property(fc.array(fc.integer({ min: 18_000, max: 18_400 }), { maxLength: 300 }), (dayNumbers) => {
        const counts = aggregateDayCounts(dayNumbers.map(fromDayNumber));
        expect(totalCount(counts)).toBe(dayNumbers.length);
        expect(counts.size).toBe(new Set(dayNumbers).size);
      }),
    );
  });
});
