import { HeatmapError, WEEKDAYS, type CivilDate, type Weekday } from "@commitgrid/core";
import { formatCivilDate, isValidCivilDate } from "./domain/civil-date.js";

export type TimezoneConfig =
  | { mode: "fixed"; offsetMinutes: number }
  | { mode: "commit_local" };

export type ThresholdMode =
  | { kind: "fixed"; thresholds: readonly number[] }
  | { kind: "quantile" };

export type HeatmapConfig = {
  timezone: TimezoneConfig;
  weekStartDay: Weekday;
  levelCount: number;
  thresholdMode: ThresholdMode;
  rangeStart: CivilDate;
  rangeEnd: CivilDate;
  maxCellCount: number;
  minYear: number;
  maxYear: number;
};

export type HeatmapConfigInput = Partial<Omit<HeatmapConfig, "rangeStart" | "rangeEnd">> & {
  rangeStart: CivilDate;
  rangeEnd: CivilDate;
};

// ±23:59, the widest offset an ISO-8601 timestamp can carry.
export const MAX_UTC_OFFSET_MINUTES = 23 * 60 + 59;

const DEFAULT_SUPPORTED_YEAR_SPAN = 100;

export const DEFAULT_HEATMAP_CONFIG: Omit<HeatmapConfig, "rangeStart" | "rangeEnd" | "minYear" | "maxYear"> = {
  timezone: { mode: "fixed", offsetMinutes: 0 },
  weekStartDay: "sunday",
  levelCount: 5,
  thresholdMode: { kind: "quantile" },
  // 100 years of 53-week grids.
  maxCellCount: 100 * 53 * 7,
};

const isValidUtcOffset = (offsetMinutes: number): boolean =>
  Number.isInteger(offsetMinutes) && Math.abs(offsetMinutes) <= MAX_UTC_OFFSET_MINUTES;

const invalidConfiguration = (
  message: string,
  details: Readonly<Record<string, string | number | boolean | null>>,
): HeatmapError => new HeatmapError("invalid_configuration", "configuration", message, details);

const validateConfig = (config: HeatmapConfig): void => {
  if (!Number.isInteger(config.levelCount) || config.levelCount < 2) {
    throw invalidConfiguration("levelCount must be an integer of at least 2", {
      levelCount: config.levelCount,
    });
  }

  if (config.timezone.mode === "fixed" && !isValidUtcOffset(config.timezone.offsetMinutes)) {
    throw invalidConfiguration("timezone offset must be a whole number of minutes within ±23:59", {
      offsetMinutes: config.timezone.offsetMinutes,
    });
  }

  if (!WEEKDAYS.includes(config.weekStartDay)) {
    throw invalidConfiguration("weekStartDay must be a weekday name", {
      weekStartDay: String(config.weekStartDay),
    });
  }

  if (!Number.isInteger(config.maxCellCount) || config.maxCellCount < 7) {
    throw invalidConfiguration("maxCellCount must be an integer of at least 7", {
      maxCellCount: config.maxCellCount,
    });
  }

  if (!Number.isInteger(config.minYear) || !Number.isInteger(config.maxYear) || config.minYear > config.maxYear) {
    throw invalidConfiguration("supported year bounds must be integers with minYear <= maxYear", {
      minYear: config.minYear,
      maxYear: config.maxYear,
    });
  }

  for (const [field, date] of [
    ["rangeStart", config.rangeStart],
    ["rangeEnd", config.rangeEnd],
  ] as const) {
    if (!isValidCivilDate(date)) {
      throw invalidConfiguration(`${field} is not a valid calendar date`, {
        field,
        year: date.year,
        month: date.month,
        day: date.day,
      });
    }
  }
};

export const resolveHeatmapConfig = (
  input: HeatmapConfigInput,
  referenceYear: number = new Date().getUTCFullYear(),
): HeatmapConfig => {
  const config: HeatmapConfig = {
    ...DEFAULT_HEATMAP_CONFIG,
    minYear: referenceYear - DEFAULT_SUPPORTED_YEAR_SPAN,
    maxYear: referenceYear + DEFAULT_SUPPORTED_YEAR_SPAN,
    ...input,
    rangeStart: { ...input.rangeStart },
    rangeEnd: { ...input.rangeEnd },
  };
  validateConfig(config);
  return config;
};

/** Stable string form of a resolved config, used as part of memo keys. */
export const serializeHeatmapConfig = (config: HeatmapConfig): string =>
  JSON.stringify([
    config.timezone.mode === "fixed" ? config.timezone.offsetMinutes : "commit_local",
    config.weekStartDay,
    config.levelCount,
    config.thresholdMode.kind === "fixed" ? config.thresholdMode.thresholds : "quantile",
    formatCivilDate(config.rangeStart),
    formatCivilDate(config.rangeEnd),
    config.maxCellCount,
    config.minYear,
    config.maxYear,
  ]);
