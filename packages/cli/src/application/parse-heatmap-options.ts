import { InvalidArgumentError } from "commander";
import { parseWeekday, type CivilDate, type Weekday } from "@commitgrid/core";
import {
  MAX_UTC_OFFSET_MINUTES,
  addDays,
  civilDateFromUnixSeconds,
  parseCivilDate,
  type HeatmapConfigInput,
  type ThresholdMode,
  type TimezoneConfig,
} from "@commitgrid/heatmap-engine";

// Inclusive range of 365 days ending on the last day.
const DEFAULT_RANGE_DAYS = 365;

const TIMEZONE_PATTERN = /^([+-])(\d{2}):?(\d{2})$/;

export const parseTimezoneOption = (value: string): TimezoneConfig => {
  const normalized = value.trim().toLowerCase();
  if (normalized === "utc" || normalized === "z") {
    return { mode: "fixed", offsetMinutes: 0 };
  }

  if (normalized === "author") {
    return { mode: "commit_local" };
  }

  const match = normalized.match(TIMEZONE_PATTERN);
  const [, sign, hours, minutes] = match ?? [];
  if (sign === undefined || hours === undefined || minutes === undefined) {
    throw new InvalidArgumentError("Expected ±HH:MM, utc or author.");
  }

  const magnitude = Number.parseInt(hours, 10) * 60 + Number.parseInt(minutes, 10);
  if (Number.parseInt(minutes, 10) >= 60 || magnitude > MAX_UTC_OFFSET_MINUTES) {
    throw new InvalidArgumentError("Offset must lie within ±23:59.");
  }

  return { mode: "fixed", offsetMinutes: sign === "-" ? -magnitude : magnitude };
};

export const parseWeekStartOption = (value: string): Weekday => {
  const weekday = parseWeekday(value);
  if (weekday === null) {
    throw new InvalidArgumentError("Expected a weekday name such as sunday or mon.");
  }

  return weekday;
};

export const parseDateOption = (value: string): CivilDate => {
  const date = parseCivilDate(value);
  if (date === null) {
    throw new InvalidArgumentError("Expected a calendar date as YYYY-MM-DD.");
  }

  return date;
};

export const parsePositiveIntegerOption = (value: string): number => {
  const trimmed = value.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }

  return parsed;
};

/** Comma-separated list; ordering and count are checked by the engine. */
export const parseThresholdsOption = (value: string): readonly number[] => {
  const parts = value.split(",").map((part) => part.trim());
  if (parts.some((part) => !/^\d+$/.test(part))) {
    throw new InvalidArgumentError("Expected comma-separated non-negative integers, for example 2,4,8.");
  }

  return parts.map((part) => Number.parseInt(part, 10));
};

export type HeatmapCliOptions = {
  since?: CivilDate;
  until?: CivilDate;
  timezone: TimezoneConfig;
  weekStart: Weekday;
  levels: number;
  thresholds?: readonly number[];
  quantile?: boolean;
  maxCells?: number;
};

const offsetForToday = (timezone: TimezoneConfig, now: Date): number =>
  timezone.mode === "fixed" ? timezone.offsetMinutes : -now.getTimezoneOffset();

export const todayIn = (timezone: TimezoneConfig, now: Date): CivilDate =>
  civilDateFromUnixSeconds(Math.floor(now.getTime() / 1000) + offsetForToday(timezone, now) * 60);

/**
 * Turns parsed command-line options into an engine configuration. Without
 * `--since` and `--until` the range is the year ending today in the target
 * timezone.
 */
export const buildHeatmapConfigInput = (options: HeatmapCliOptions, now: Date = new Date()): HeatmapConfigInput => {
  const rangeEnd = options.until ?? todayIn(options.timezone, now);
  const rangeStart = options.since ?? addDays(rangeEnd, -(DEFAULT_RANGE_DAYS - 1));
  const thresholdMode: ThresholdMode =
    options.thresholds === undefined || options.quantile === true
      ? { kind: "quantile" }
      : { kind: "fixed", thresholds: options.thresholds };

  return {
    rangeStart,
    rangeEnd,
    timezone: options.timezone,
    weekStartDay: options.weekStart,
    levelCount: options.levels,
    thresholdMode,
    ...(options.maxCells === undefined ? {} : { maxCellCount: options.maxCells }),
  };
};
