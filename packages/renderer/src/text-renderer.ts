import type { GridCell, Heatmap } from "@commitgrid/core";
import { PADDING_GLYPH, TEXT_SHADES, type HeatmapRenderer, type RenderFormat } from "./domain.js";
import { monthLabels, shadeFor, weekdayRowLabels } from "./layout.js";

export const ROW_LABEL_WIDTH = 4;

export type CellPainter = {
  /** Visible width of one painted cell. */
  cellWidth: number;
  gap: string;
  /** Styles month names, weekday names and the legend words. */
  label: (text: string) => string;
  paint: (cell: GridCell, levelCount: number) => string;
  legend: (levelCount: number) => readonly string[];
};

export const textCellPainter: CellPainter = {
  cellWidth: 1,
  gap: " ",
  label: (text) => text,
  paint: (cell, levelCount) =>
    cell.inRange ? shadeFor(TEXT_SHADES, cell.level, levelCount, PADDING_GLYPH) : PADDING_GLYPH,
  legend: (levelCount) =>
    Array.from({ length: levelCount }, (_, level) => shadeFor(TEXT_SHADES, level, levelCount, PADDING_GLYPH)),
};

const renderMonthLine = (heatmap: Heatmap, columnWidth: number): string => {
  const characters: string[] = [];
  let nextFree = ROW_LABEL_WIDTH;

  for (const label of monthLabels(heatmap)) {
    const column = ROW_LABEL_WIDTH + label.weekIndex * columnWidth;
    if (column < nextFree) {
      continue;
    }

    while (characters.length < column) {
      characters.push(" ");
    }
    characters.push(...label.text);
    nextFree = column + label.text.length + 1;
  }

  return characters.join("");
};

/**
 * Weekdays as rows, weeks as columns, month names above and a legend below.
 * Shared by the plain-text and terminal renderers; only the cell painter differs.
 */
export const renderGridLines = (heatmap: Heatmap, painter: CellPainter): string[] => {
  const levelCount = heatmap.scale.levelCount;
  const blank = PADDING_GLYPH.repeat(painter.cellWidth);
  const lines = [painter.label(renderMonthLine(heatmap, painter.cellWidth + painter.gap.length).trimEnd())];

  weekdayRowLabels(heatmap.weekStartDay).forEach((label, row) => {
    const cells = heatmap.weeks.map((week) => {
      const cell = week[row];
      return cell === undefined ? blank : painter.paint(cell, levelCount);
    });
    const rowLabel = label === "" ? "" : painter.label(label);
    const indent = " ".repeat(ROW_LABEL_WIDTH - label.length);
    lines.push(`${rowLabel}${indent}${cells.join(painter.gap)}`.trimEnd());
  });

  lines.push(`${painter.label("Less")} ${painter.legend(levelCount).join(" ")} ${painter.label("More")}`);
  return lines;
};

export class TextHeatmapRenderer implements HeatmapRenderer {
  readonly format: RenderFormat = "text";

  render(heatmap: Heatmap): string {
    return renderGridLines(heatmap, textCellPainter).join("\n");
  }
}
