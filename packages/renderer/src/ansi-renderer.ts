import { Chalk, type ChalkInstance } from "chalk";
import type { Heatmap } from "@commitgrid/core";
import { DEFAULT_PALETTE, type HeatmapRenderer, type RenderFormat } from "./domain.js";
import { shadeFor } from "./layout.js";
import { renderGridLines, type CellPainter } from "./text-renderer.js";

const BLOCK = "  ";

export type AnsiRendererOptions = {
  palette: readonly string[];
  chalk: ChalkInstance;
};

const createAnsiCellPainter = (options: AnsiRendererOptions): CellPainter => {
  const { chalk, palette } = options;
  const block = (level: number, levelCount: number): string =>
    chalk.bgHex(shadeFor(palette, level, levelCount, DEFAULT_PALETTE[0] ?? "#000000"))(BLOCK);

  return {
    cellWidth: BLOCK.length,
    gap: " ",
    label: (text) => chalk.dim(text),
    paint: (cell, levelCount) => (cell.inRange ? block(cell.level, levelCount) : BLOCK),
    legend: (levelCount) => Array.from({ length: levelCount }, (_, level) => block(level, levelCount)),
  };
};

export class AnsiHeatmapRenderer implements HeatmapRenderer {
  readonly format: RenderFormat = "ansi";
  private readonly painter: CellPainter;

  constructor(options: Partial<AnsiRendererOptions> = {}) {
    this.painter = createAnsiCellPainter({
      palette: options.palette ?? DEFAULT_PALETTE,
      chalk: options.chalk ?? new Chalk(),
    });
  }

  render(heatmap: Heatmap): string {
    return renderGridLines(heatmap, this.painter).join("\n");
  }
}
