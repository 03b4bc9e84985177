import type { CivilDate, GridCell, Heatmap, Weekday } from "@commitgrid/core";

type FixtureDay = { count: number; level: number };

export type HeatmapFixtureInput = {
  firstGridDate: string;
  weekCount: number;
  rangeStart: string;
  rangeEnd: string;
  weekStartDay?: Weekday;
  levelCount?: number;
  days?: Readonly<Record<string, FixtureDay>>;
};

const toCivilDate = (value: Date): CivilDate => ({
  year: value.getUTCFullYear(),
  month: value.getUTCMonth() + 1,
  day: value.getUTCDate(),
});

const isoDay = (value: Date): string => value.toISOString().slice(0, 10);

export const makeHeatmap = (input: HeatmapFixtureInput): Heatmap => {
  const first = new Date(`${input.firstGridDate}T00:00:00Z`);
  const days = input.days ?? {};
  const levelCount = input.levelCount ?? 5;
  const weeks: GridCell[][] = [];
  let lastGridDate = toCivilDate(first);

  for (let week = 0; week < input.weekCount; week += 1) {
    const cells: GridCell[] = [];
    for (let row = 0; row < 7; row += 1) {
      const date = new Date(first.getTime() + (week * 7 + row) * 86_400_000);
      const key = isoDay(date);
      lastGridDate = toCivilDate(date);
      if (key < input.rangeStart || key > input.rangeEnd) {
        cells.push({ date: toCivilDate(date), inRange: false, level: null, count: null });
      } else {
        const day = days[key] ?? { count: 0, level: 0 };
        cells.push({ date: toCivilDate(date), inRange: true, level: day.level, count: day.count });
      }
    }
    weeks.push(cells);
  }

  const counts = Object.entries(days)
    .filter(([key]) => key >= input.rangeStart && key <= input.rangeEnd)
    .map(([, day]) => day.count);

  return {
    weeks,
    rangeStart: toCivilDate(new Date(`${input.rangeStart}T00:00:00Z`)),
    rangeEnd: toCivilDate(new Date(`${input.rangeEnd}T00:00:00Z`)),
    weekStartDay: input.weekStartDay ?? "sunday",
    firstGridDate: toCivilDate(first),
    lastGridDate,
    totalCommits: counts.reduce((sum, count) => sum + count, 0),
    activeDayCount: counts.filter((count) => count > 0).length,
    maxDailyCount: Math.max(0, ...counts),
    outOfRangeCommits: 0,
    scale: { levelCount, lowerBounds: [0, null, null, 1, 3] },
  };
};

/** 2024-01-01 through 2024-01-08 with Monday-first weeks: three commits on New Year's Day and one a week later. */
export const januaryHeatmap = (): Heatmap =>
  makeHeatmap({
    firstGridDate: "2024-01-01",
    weekCount: 2,
    rangeStart: "2024-01-01",
    rangeEnd: "2024-01-08",
    weekStartDay: "monday",
    days: {
      "2024-01-01": { count: 3, level: 4 },
      "2024-01-08": { count: 1, level: 3 },
    },
  });
