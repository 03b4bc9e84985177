import type { Heatmap } from "@commitgrid/core";
import { AnsiHeatmapRenderer, type AnsiRendererOptions } from "./ansi-renderer.js";
import type { HeatmapRenderer, RenderFormat } from "./domain.js";
import { JsonHeatmapRenderer } from "./json-renderer.js";
import { SvgHeatmapRenderer } from "./svg-renderer.js";
import { TextHeatmapRenderer } from "./text-renderer.js";

export {
  DEFAULT_PALETTE,
  PADDING_GLYPH,
  RENDER_FORMATS,
  TEXT_SHADES,
  type HeatmapRenderer,
  type RenderFormat,
} from "./domain.js";
export {
  MONTH_LABELS,
  formatSummaryLine,
  monthLabels,
  shadeFor,
  shadeIndex,
  weekdayRowLabels,
  type MonthLabel,
} from "./layout.js";
export { AnsiHeatmapRenderer, type AnsiRendererOptions } from "./ansi-renderer.js";
export { JsonHeatmapRenderer, toJsonHeatmap, type JsonCell, type JsonHeatmap } from "./json-renderer.js";
export { SvgHeatmapRenderer, cellTitle, type SvgRendererOptions } from "./svg-renderer.js";
export { TextHeatmapRenderer, renderGridLines, textCellPainter, type CellPainter } from "./text-renderer.js";

export type RendererOptions = Partial<AnsiRendererOptions>;

const RENDERER_FACTORIES: Record<RenderFormat, (options: RendererOptions) => HeatmapRenderer> = {
  text: () => new TextHeatmapRenderer(),
  ansi: (options) => new AnsiHeatmapRenderer(options),
  svg: (options) => new SvgHeatmapRenderer(options.palette === undefined ? {} : { palette: options.palette }),
  json: () => new JsonHeatmapRenderer(),
};

export const isRenderFormat = (value: string): value is RenderFormat =>
  Object.prototype.hasOwnProperty.call(RENDERER_FACTORIES, value);

export const createRenderer = (format: RenderFormat, options: RendererOptions = {}): HeatmapRenderer =>
  RENDERER_FACTORIES[format](options);

export const formatHeatmap = (heatmap: Heatmap, format: RenderFormat, options: RendererOptions = {}): string =>
  createRenderer(format, options).render(heatmap);
