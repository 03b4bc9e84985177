export {
  assembleHeatmap,
  assembleHeatmapWithConfig,
  type AssembleHeatmapInput,
  type HeatmapAssemblyProgressEvent,
} from "./application/assemble-heatmap.js";
export {
  createHeatmapMemo,
  fingerprintCommits,
  type HeatmapMemo,
  type HeatmapMemoOptions,
} from "./application/heatmap-memo.js";
export {
  DEFAULT_HEATMAP_CONFIG,
  MAX_UTC_OFFSET_MINUTES,
  resolveHeatmapConfig,
  type HeatmapConfig,
  type HeatmapConfigInput,
  type ThresholdMode,
  type TimezoneConfig,
} from "./config.js";
export { addDays, civilDateFromUnixSeconds, parseCivilDate } from "./domain/civil-date.js";
export { aggregateDayCounts, type DayCount, type DayCountMap } from "./domain/day-aggregator.js";
export { bucketizeDayCounts, computeQuantileThresholds, type BucketizeResult } from "./domain/intensity-bucketizer.js";
export { buildCalendarGrid, computeGridBounds, type BuildCalendarGridInput } from "./domain/calendar-grid-builder.js";
export { normalizeCommitTimes, type TimeNormalizationOptions } from "./domain/time-normalizer.js";
