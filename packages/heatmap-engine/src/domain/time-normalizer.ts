import { HeatmapError, type CivilDate, type CommitEvent } from "@commitgrid/core";
import type { TimezoneConfig } from "../config.js";
import { MAX_UTC_OFFSET_MINUTES } from "../config.js";
import { civilDateFromUnixSeconds } from "./civil-date.js";

export type TimeNormalizationOptions = {
  timezone: TimezoneConfig;
  minYear: number;
  maxYear: number;
};

const invalidTimestamp = (
  index: number,
  message: string,
  event: CommitEvent,
): HeatmapError =>
  new HeatmapError("invalid_timestamp", "time_normalizer", message, {
    index,
    instant: Number.isFinite(event.instant) ? event.instant : String(event.instant),
    utcOffsetMinutes: Number.isFinite(event.utcOffsetMinutes)
      ? event.utcOffsetMinutes
      : String(event.utcOffsetMinutes),
  });

const targetOffsetFor = (event: CommitEvent, timezone: TimezoneConfig): number =>
  timezone.mode === "fixed" ? timezone.offsetMinutes : event.utcOffsetMinutes;

export const normalizeCommitEvent = (
  event: CommitEvent,
  options: TimeNormalizationOptions,
  index = 0,
): CivilDate => {
  if (!Number.isFinite(event.instant)) {
    throw invalidTimestamp(index, "commit instant is not a finite number", event);
  }

  if (!Number.isInteger(event.utcOffsetMinutes) || Math.abs(event.utcOffsetMinutes) > MAX_UTC_OFFSET_MINUTES) {
    throw invalidTimestamp(index, "commit UTC offset is out of range", event);
  }

  // Wall clock where the commit was made, then the same instant seen from the target offset.
  const originWallClock = event.instant + event.utcOffsetMinutes * 60;
  const targetWallClock =
    originWallClock - event.utcOffsetMinutes * 60 + targetOffsetFor(event, options.timezone) * 60;

  const date = civilDateFromUnixSeconds(targetWallClock);
  if (date.year < options.minYear || date.year > options.maxYear) {
    throw invalidTimestamp(
      index,
      `commit date falls outside the supported years ${options.minYear}..${options.maxYear}`,
      event,
    );
  }

  return date;
};

export const normalizeCommitTimes = (
  events: readonly CommitEvent[],
  options: TimeNormalizationOptions,
): readonly CivilDate[] => events.map((event, index) => normalizeCommitEvent(event, options, index));
