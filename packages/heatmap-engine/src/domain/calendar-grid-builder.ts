import {
  HeatmapError,
  type CalendarGrid,
  type CalendarWeek,
  type CivilDate,
  type CivilDateKey,
  type GridCell,
  type Level,
  type Weekday,
} from "@commitgrid/core";
import {
  formatCivilDate,
  fromDayNumber,
  isValidCivilDate,
  toDayNumber,
  weekdayIndex,
  weekdayIndexOfDayNumber,
} from "./civil-date.js";
import type { DayCountMap } from "./day-aggregator.js";

export type BuildCalendarGridInput = {
  rangeStart: CivilDate;
  rangeEnd: CivilDate;
  weekStartDay: Weekday;
  levels: ReadonlyMap<CivilDateKey, Level>;
  counts?: DayCountMap;
  maxCellCount: number;
};

export type GridBounds = {
  firstGridDay: number;
  lastGridDay: number;
  cellCount: number;
};

const DAYS_PER_WEEK = 7;

const mod = (value: number, divisor: number): number => ((value % divisor) + divisor) % divisor;

export const computeGridBounds = (
  rangeStart: CivilDate,
  rangeEnd: CivilDate,
  weekStartDay: Weekday,
): GridBounds => {
  const startIndex = weekdayIndex(weekStartDay);
  const startDay = toDayNumber(rangeStart);
  const endDay = toDayNumber(rangeEnd);

  const firstGridDay = startDay - mod(weekdayIndexOfDayNumber(startDay) - startIndex, DAYS_PER_WEEK);
  const lastGridDay =
    endDay + (DAYS_PER_WEEK - 1 - mod(weekdayIndexOfDayNumber(endDay) - startIndex, DAYS_PER_WEEK));

  return {
    firstGridDay,
    lastGridDay,
    cellCount: lastGridDay - firstGridDay + 1,
  };
};

const assertValidRange = (rangeStart: CivilDate, rangeEnd: CivilDate): void => {
  if (!isValidCivilDate(rangeStart) || !isValidCivilDate(rangeEnd)) {
    throw new HeatmapError("invalid_range", "calendar_grid_builder", "range bounds must be valid calendar dates", {
      rangeStart: `${rangeStart.year}-${rangeStart.month}-${rangeStart.day}`,
      rangeEnd: `${rangeEnd.year}-${rangeEnd.month}-${rangeEnd.day}`,
    });
  }

  if (toDayNumber(rangeStart) > toDayNumber(rangeEnd)) {
    throw new HeatmapError("invalid_range", "calendar_grid_builder", "range start is after range end", {
      rangeStart: formatCivilDate(rangeStart),
      rangeEnd: formatCivilDate(rangeEnd),
    });
  }
};

export const buildCalendarGrid = (input: BuildCalendarGridInput): CalendarGrid => {
  assertValidRange(input.rangeStart, input.rangeEnd);

  const bounds = computeGridBounds(input.rangeStart, input.rangeEnd, input.weekStartDay);
  if (bounds.cellCount > input.maxCellCount) {
    throw new HeatmapError(
      "range_too_large",
      "calendar_grid_builder",
      `grid would need ${bounds.cellCount} cells, more than the limit of ${input.maxCellCount}`,
      { cellCount: bounds.cellCount, maxCellCount: input.maxCellCount },
    );
  }

  const rangeStartDay = toDayNumber(input.rangeStart);
  const rangeEndDay = toDayNumber(input.rangeEnd);
  const weeks: CalendarWeek[] = [];
  let currentWeek: GridCell[] = [];

  for (let dayNumber = bounds.firstGridDay; dayNumber <= bounds.lastGridDay; dayNumber += 1) {
    const date = fromDayNumber(dayNumber);
    if (dayNumber >= rangeStartDay && dayNumber <= rangeEndDay) {
      const key = formatCivilDate(date);
      currentWeek.push({
        date,
        inRange: true,
        level: input.levels.get(key) ?? 0,
        count: input.counts?.get(key)?.count ?? 0,
      });
    } else {
      currentWeek.push({ date, inRange: false, level: null, count: null });
    }

    if (currentWeek.length === DAYS_PER_WEEK) {
      weeks.push(currentWeek);
      currentWeek = [];
    }
  }

  return {
    weeks,
    rangeStart: fromDayNumber(rangeStartDay),
    rangeEnd: fromDayNumber(rangeEndDay),
    weekStartDay: input.weekStartDay,
    firstGridDate: fromDayNumber(bounds.firstGridDay),
    lastGridDate: fromDayNumber(bounds.lastGridDay),
  };
};
