import { formatCivilDate, type GridCell, type Heatmap } from "@commitgrid/core";
import { DEFAULT_PALETTE, type HeatmapRenderer, type RenderFormat } from "./domain.js";
import { formatSummaryLine, monthLabels, shadeFor, weekdayRowLabels } from "./layout.js";

export const CELL_SIZE = 11;
export const CELL_GAP = 3;
const CELL_STEP = CELL_SIZE + CELL_GAP;
const LABEL_WIDTH = 28;
const HEADER_HEIGHT = 16;
const FONT = 'font-family="sans-serif" font-size="9" fill="#8b949e"';

export type SvgRendererOptions = {
  palette: readonly string[];
};

const escapeXml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;");

export const cellTitle = (cell: GridCell): string => {
  const date = formatCivilDate(cell.date);
  if (!cell.inRange) {
    return date;
  }

  return `${cell.count} ${cell.count === 1 ? "commit" : "commits"} on ${date}`;
};

export class SvgHeatmapRenderer implements HeatmapRenderer {
  readonly format: RenderFormat = "svg";
  private readonly palette: readonly string[];

  constructor(options: Partial<SvgRendererOptions> = {}) {
    this.palette = options.palette ?? DEFAULT_PALETTE;
  }

  render(heatmap: Heatmap): string {
    const levelCount = heatmap.scale.levelCount;
    const width = LABEL_WIDTH + heatmap.weeks.length * CELL_STEP;
    const height = HEADER_HEIGHT + 7 * CELL_STEP;
    const fallback = this.palette[0] ?? "#161b22";
    const parts: string[] = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}" role="img">`,
      `<title>${escapeXml(formatSummaryLine(heatmap))}</title>`,
    ];

    for (const label of monthLabels(heatmap)) {
      const x = LABEL_WIDTH + label.weekIndex * CELL_STEP;
      parts.push(`<text x="${x}" y="10" ${FONT}>${label.text}</text>`);
    }

    weekdayRowLabels(heatmap.weekStartDay).forEach((label, row) => {
      if (label === "") {
        return;
      }

      const y = HEADER_HEIGHT + row * CELL_STEP + CELL_SIZE - 2;
      parts.push(`<text x="0" y="${y}" ${FONT}>${label}</text>`);
    });

    heatmap.weeks.forEach((week, weekIndex) => {
      week.forEach((cell, row) => {
        if (!cell.inRange) {
          return;
        }

        const x = LABEL_WIDTH + weekIndex * CELL_STEP;
        const y = HEADER_HEIGHT + row * CELL_STEP;
        const fill = shadeFor(this.palette, cell.level, levelCount, fallback);
        parts.push(
          `<rect x="${x}" y="${y}" width="${CELL_SIZE}" height="${CELL_SIZE}" rx="2" fill="${fill}" data-date="${formatCivilDate(cell.date)}" data-level="${cell.level}"><title>${cellTitle(cell)}</title></rect>`,
        );
      });
    });

    parts.push("</svg>");
    return parts.join("\n");
  }
}
