export type CivilDate = {
  year: number;
  month: number;
  day: number;
};

/** `YYYY-MM-DD`, used as the map key for a CivilDate. */
export type CivilDateKey = string;

export const WEEKDAYS = [
  "sunday",
  "monday",
  "tuesday",
  "wednesday",
  "thursday",
  "friday",
  "saturday",
] as const;

export type Weekday = (typeof WEEKDAYS)[number];

export type CommitEvent = {
  /** Unix seconds. */
  instant: number;
  utcOffsetMinutes: number;
};

export type Level = number;

export type InRangeCell = {
  date: CivilDate;
  inRange: true;
  level: Level;
  count: number;
};

export type PaddingCell = {
  date: CivilDate;
  inRange: false;
  level: null;
  count: null;
};

export type GridCell = InRangeCell | PaddingCell;

export type CalendarWeek = readonly GridCell[];

export type CalendarGrid = {
  weeks: readonly CalendarWeek[];
  rangeStart: CivilDate;
  rangeEnd: CivilDate;
  weekStartDay: Weekday;
  firstGridDate: CivilDate;
  lastGridDate: CivilDate;
};

export type LevelScale = {
  levelCount: number;
  /** Smallest daily count mapped to each level; `null` when no count reaches it. */
  lowerBounds: readonly (number | null)[];
};

export type HeatmapSummary = {
  totalCommits: number;
  activeDayCount: number;
  maxDailyCount: number;
  outOfRangeCommits: number;
};

export type Heatmap = CalendarGrid &
  HeatmapSummary & {
    scale: LevelScale;
  };

export type HeatmapErrorKind =
  | "invalid_timestamp"
  | "invalid_range"
  | "range_too_large"
  | "invalid_configuration";

export type HeatmapStage =
  | "configuration"
  | "time_normalizer"
  | "day_aggregator"
  | "intensity_bucketizer"
  | "calendar_grid_builder";

export type HeatmapErrorDetails = Readonly<Record<string, string | number | boolean | null>>;

export class HeatmapError extends Error {
  readonly kind: HeatmapErrorKind;
  readonly stage: HeatmapStage;
  readonly details: HeatmapErrorDetails;

  constructor(
    kind: HeatmapErrorKind,
    stage: HeatmapStage,
    message: string,
    details: HeatmapErrorDetails = {},
  ) {
    super(message);
    this.name = "HeatmapError";
    this.kind = kind;
    this.stage = stage;
    this.details = details;
  }
}

export const isHeatmapError = (error: unknown): error is HeatmapError =>
  error instanceof HeatmapError;

const padDatePart = (value: number, width: number): string => {
  const digits = String(Math.abs(value)).padStart(width, "0");
  return value < 0 ? `-${digits}` : digits;
};

export const formatCivilDate = (date: CivilDate): CivilDateKey =>
  `${padDatePart(date.year, 4)}-${padDatePart(date.month, 2)}-${padDatePart(date.day, 2)}`;

export const parseWeekday = (value: string): Weekday | null => {
  const normalized = value.trim().toLowerCase();
  const match = WEEKDAYS.find(
    (weekday) => weekday === normalized || weekday.slice(0, 3) === normalized,
  );
  return match ?? null;
};
