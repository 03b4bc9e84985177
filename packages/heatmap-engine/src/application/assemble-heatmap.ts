import type { CivilDateKey, CommitEvent, Heatmap, HeatmapSummary, LevelScale, Weekday } from "@commitgrid/core";
import { resolveHeatmapConfig, type HeatmapConfig, type HeatmapConfigInput } from "../config.js";
import { buildCalendarGrid } from "../domain/calendar-grid-builder.js";
import { toDayNumber } from "../domain/civil-date.js";
import { aggregateDayCounts, totalCount, type DayCount, type DayCountMap } from "../domain/day-aggregator.js";
import { bucketizeDayCounts } from "../domain/intensity-bucketizer.js";
import { normalizeCommitTimes } from "../domain/time-normalizer.js";

export type AssembleHeatmapInput = {
  commits: readonly CommitEvent[];
  config: HeatmapConfigInput;
  /** Year the default supported-year window is centred on. Defaults to the current UTC year. */
  referenceYear?: number;
};

export type HeatmapAssemblyProgressEvent =
  | { stage: "config_resolved"; weekStartDay: Weekday; levelCount: number }
  | { stage: "times_normalized"; commits: number }
  | { stage: "days_aggregated"; activeDays: number; inRangeDays: number }
  | { stage: "levels_assigned"; scale: LevelScale }
  | { stage: "grid_built"; weeks: number; cells: number };

const selectInRange = (counts: DayCountMap, config: HeatmapConfig): DayCountMap => {
  const startDay = toDayNumber(config.rangeStart);
  const endDay = toDayNumber(config.rangeEnd);
  const selected = new Map<CivilDateKey, DayCount>();

  for (const [key, entry] of counts) {
    const dayNumber = toDayNumber(entry.date);
    if (dayNumber >= startDay && dayNumber <= endDay) {
      selected.set(key, entry);
    }
  }

  return selected;
};

const summarize = (allCommits: number, inRange: DayCountMap): HeatmapSummary => {
  const totalCommits = totalCount(inRange);
  let maxDailyCount = 0;
  for (const entry of inRange.values()) {
    maxDailyCount = Math.max(maxDailyCount, entry.count);
  }

  return {
    totalCommits,
    activeDayCount: inRange.size,
    maxDailyCount,
    outOfRangeCommits: allCommits - totalCommits,
  };
};

export const assembleHeatmapWithConfig = (
  commits: readonly CommitEvent[],
  config: HeatmapConfig,
  onProgress?: (event: HeatmapAssemblyProgressEvent) => void,
): Heatmap => {
  const dates = normalizeCommitTimes(commits, config);
  onProgress?.({ stage: "times_normalized", commits: dates.length });

  const counts = aggregateDayCounts(dates);
  const inRange = selectInRange(counts, config);
  onProgress?.({ stage: "days_aggregated", activeDays: counts.size, inRangeDays: inRange.size });

  const { levels, scale } = bucketizeDayCounts(inRange, config.levelCount, config.thresholdMode);
  onProgress?.({ stage: "levels_assigned", scale });

  const grid = buildCalendarGrid({
    rangeStart: config.rangeStart,
    rangeEnd: config.rangeEnd,
    weekStartDay: config.weekStartDay,
    levels,
    counts: inRange,
    maxCellCount: config.maxCellCount,
  });
  onProgress?.({ stage: "grid_built", weeks: grid.weeks.length, cells: grid.weeks.length * 7 });

  return {
    ...grid,
    ...summarize(commits.length, inRange),
    scale,
  };
};

export const assembleHeatmap = (
  input: AssembleHeatmapInput,
  onProgress?: (event: HeatmapAssemblyProgressEvent) => void,
): Heatmap => {
  const config = resolveHeatmapConfig(input.config, input.referenceYear);
  onProgress?.({ stage: "config_resolved", weekStartDay: config.weekStartDay, levelCount: config.levelCount });
  return assembleHeatmapWithConfig(input.commits, config, onProgress);
};
