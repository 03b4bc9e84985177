import { formatCivilDate, type GridCell, type Heatmap } from "@commitgrid/core";
import type { HeatmapRenderer, RenderFormat } from "./domain.js";

export type JsonCell = {
  date: string;
  inRange: boolean;
  level: number | null;
  count: number | null;
};

export type JsonHeatmap = {
  rangeStart: string;
  rangeEnd: string;
  weekStartDay: string;
  firstGridDate: string;
  lastGridDate: string;
  totalCommits: number;
  activeDayCount: number;
  maxDailyCount: number;
  outOfRangeCommits: number;
  scale: {
    levelCount: number;
    lowerBounds: readonly (number | null)[];
  };
  weeks: JsonCell[][];
};

const toJsonCell = (cell: GridCell): JsonCell => ({
  date: formatCivilDate(cell.date),
  inRange: cell.inRange,
  level: cell.level,
  count: cell.count,
});

export const toJsonHeatmap = (heatmap: Heatmap): JsonHeatmap => ({
  rangeStart: formatCivilDate(heatmap.rangeStart),
  rangeEnd: formatCivilDate(heatmap.rangeEnd),
  weekStartDay: heatmap.weekStartDay,
  firstGridDate: formatCivilDate(heatmap.firstGridDate),
  lastGridDate: formatCivilDate(heatmap.lastGridDate),
  totalCommits: heatmap.totalCommits,
  activeDayCount: heatmap.activeDayCount,
  maxDailyCount: heatmap.maxDailyCount,
  outOfRangeCommits: heatmap.outOfRangeCommits,
  scale: {
    levelCount: heatmap.scale.levelCount,
    lowerBounds: heatmap.scale.lowerBounds,
  },
  weeks: heatmap.weeks.map((week) => week.map(toJsonCell)),
});

export class JsonHeatmapRenderer implements HeatmapRenderer {
  readonly format: RenderFormat = "json";

  render(heatmap: Heatmap): string {
    return JSON.stringify(toJsonHeatmap(heatmap), null, 2);
  }
}
