import { WEEKDAYS, type Heatmap, type Level, type Weekday } from "@commitgrid/core";

export const MONTH_LABELS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec",
] as const;

export type MonthLabel = {
  weekIndex: number;
  text: string;
};

/**
 * Picks one of `shadeCount` shades for a level. Level 0 always takes the first
 * shade and the top level always takes the last one.
 */
export const shadeIndex = (level: Level, levelCount: number, shadeCount: number): number => {
  if (level <= 0) {
    return 0;
  }

  if (level >= levelCount - 1) {
    return shadeCount - 1;
  }

  return 1 + Math.round(((level - 1) * (shadeCount - 2)) / Math.max(1, levelCount - 2));
};

export const shadeFor = <T>(shades: readonly T[], level: Level, levelCount: number, fallback: T): T =>
  shades[shadeIndex(level, levelCount, shades.length)] ?? fallback;

export const monthLabels = (heatmap: Heatmap): readonly MonthLabel[] => {
  const labels: MonthLabel[] = [];
  let lastMonth: number | null = null;

  heatmap.weeks.forEach((week, weekIndex) => {
    const firstInRange = week.find((cell) => cell.inRange);
    if (firstInRange === undefined || firstInRange.date.month === lastMonth) {
      return;
    }

    lastMonth = firstInRange.date.month;
    labels.push({ weekIndex, text: MONTH_LABELS[firstInRange.date.month - 1] ?? "" });
  });

  return labels;
};

/** Row labels in grid order; only every other row is named. */
export const weekdayRowLabels = (weekStartDay: Weekday): readonly string[] => {
  const startIndex = WEEKDAYS.indexOf(weekStartDay);
  return Array.from({ length: 7 }, (_, row) => {
    if (row % 2 === 0) {
      return "";
    }

    const weekday = WEEKDAYS[(startIndex + row) % 7] ?? "";
    return `${weekday.charAt(0).toUpperCase()}${weekday.slice(1, 3)}`;
  });
};

const pluralize = (count: number, singular: string, plural = `${singular}s`): string =>
  `${count} ${count === 1 ? singular : plural}`;

export const formatSummaryLine = (heatmap: Heatmap): string =>
  `${pluralize(heatmap.totalCommits, "commit")} on ${pluralize(heatmap.activeDayCount, "active day")} (max ${heatmap.maxDailyCount} in one day)`;
