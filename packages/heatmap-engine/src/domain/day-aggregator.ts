import type { CivilDate, CivilDateKey } from "@commitgrid/core";
import { formatCivilDate } from "./civil-date.js";

export type DayCount = {
  date: CivilDate;
  count: number;
};

export type DayCountMap = ReadonlyMap<CivilDateKey, DayCount>;

export const aggregateDayCounts = (dates: readonly CivilDate[]): DayCountMap => {
  const counts = new Map<CivilDateKey, DayCount>();

  for (const date of dates) {
    const key = formatCivilDate(date);
    const existing = counts.get(key);
    counts.set(key, { date: existing?.date ?? date, count: (existing?.count ?? 0) + 1 });
  }

  return counts;
};

export const totalCount = (counts: DayCountMap): number => {
  let total = 0;
  for (const entry of counts.values()) {
    total += entry.count;
  }
  return total;
};
