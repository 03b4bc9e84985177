import { HeatmapError, type CivilDateKey, type Level, type LevelScale } from "@commitgrid/core";
import type { ThresholdMode } from "../config.js";
import type { DayCountMap } from "./day-aggregator.js";

export type BucketizeResult = {
  levels: ReadonlyMap<CivilDateKey, Level>;
  scale: LevelScale;
};

type LevelCut = {
  /** Lower bound (inclusive) of the first non-zero level in use. */
  floor: number;
  thresholds: readonly number[];
  /** Number of non-zero levels skipped at the bottom of the scale. */
  shift: number;
};

export const validateFixedThresholds = (thresholds: readonly number[], levelCount: number): void => {
  const expected = levelCount - 2;
  if (thresholds.length !== expected) {
    throw new HeatmapError(
      "invalid_configuration",
      "intensity_bucketizer",
      `expected ${expected} thresholds for ${levelCount} levels, got ${thresholds.length}`,
      { levelCount, thresholdCount: thresholds.length },
    );
  }

  thresholds.forEach((threshold, index) => {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new HeatmapError(
        "invalid_configuration",
        "intensity_bucketizer",
        "thresholds must be positive integers",
        { index, threshold },
      );
    }

    const previous = index === 0 ? undefined : thresholds[index - 1];
    if (previous !== undefined && threshold <= previous) {
      throw new HeatmapError(
        "invalid_configuration",
        "intensity_bucketizer",
        "thresholds must be strictly ascending",
        { index, threshold, previous },
      );
    }
  });
};

/**
 * Cut points over the sorted active-day counts so every non-zero level holds
 * about the same number of days. A cut never repeats: when the quantile value
 * equals the previous cut, the next larger observed count is used instead.
 */
export const computeQuantileThresholds = (
  sortedCounts: readonly number[],
  levelCount: number,
): readonly number[] => {
  const nonZeroLevels = levelCount - 1;
  const thresholds: number[] = [];
  let previous = sortedCounts[0];
  if (previous === undefined) {
    return thresholds;
  }

  for (let k = 1; k < nonZeroLevels; k += 1) {
    const index = Math.min(sortedCounts.length - 1, Math.floor((k * sortedCounts.length) / nonZeroLevels));
    const candidate: number = sortedCounts[index] ?? previous;
    const lowerBound: number = previous;
    const threshold: number | undefined = candidate > lowerBound ? candidate : sortedCounts.find((count) => count > lowerBound);
    if (threshold === undefined) {
      break;
    }

    thresholds.push(threshold);
    previous = threshold;
  }

  return thresholds;
};

const createLevelCut = (counts: readonly number[], levelCount: number, mode: ThresholdMode): LevelCut => {
  if (mode.kind === "fixed") {
    return { floor: 1, thresholds: mode.thresholds, shift: 0 };
  }

  const sorted = counts.filter((count) => count > 0).sort((a, b) => a - b);
  const thresholds = computeQuantileThresholds(sorted, levelCount);
  // Busiest day always lands on the top level, also when there are fewer distinct counts than levels.
  return {
    floor: sorted[0] ?? 1,
    thresholds,
    shift: levelCount - 2 - thresholds.length,
  };
};

const levelForCount = (count: number, cut: LevelCut): Level => {
  if (count <= 0) {
    return 0;
  }

  const passed = cut.thresholds.filter((threshold) => count >= threshold).length;
  return 1 + cut.shift + passed;
};

const createLevelScale = (cut: LevelCut, levelCount: number, withoutActiveDays: boolean): LevelScale => {
  const lowerBounds: (number | null)[] = Array.from({ length: levelCount }, () => null);
  lowerBounds[0] = 0;
  if (withoutActiveDays) {
    return { levelCount, lowerBounds };
  }

  const starts = [cut.floor, ...cut.thresholds];
  starts.forEach((start, index) => {
    const next = starts[index + 1];
    if (next === undefined || start < next) {
      lowerBounds[1 + cut.shift + index] = start;
    }
  });

  return { levelCount, lowerBounds };
};

export const bucketizeDayCounts = (
  counts: DayCountMap,
  levelCount: number,
  mode: ThresholdMode,
): BucketizeResult => {
  if (mode.kind === "fixed") {
    validateFixedThresholds(mode.thresholds, levelCount);
  }

  const values = [...counts.values()].map((entry) => entry.count);
  const cut = createLevelCut(values, levelCount, mode);

  const levels = new Map<CivilDateKey, Level>();
  for (const [key, entry] of counts) {
    levels.set(key, levelForCount(entry.count, cut));
  }

  return {
    levels,
    // Quantile scales without active days have no observed bounds to report.
    scale: createLevelScale(
      cut,
      levelCount,
      mode.kind === "quantile" && !values.some((value) => value > 0),
    ),
  };
};
