import type { Heatmap } from "@commitgrid/core";

export type RenderFormat = "text" | "ansi" | "svg" | "json";

export const RENDER_FORMATS: readonly RenderFormat[] = ["text", "ansi", "svg", "json"];

export interface HeatmapRenderer {
  readonly format: RenderFormat;
  render(heatmap: Heatmap): string;
}

// GitHub-like greens, from "no activity" to the busiest days.
export const DEFAULT_PALETTE: readonly string[] = ["#161b22", "#0e4429", "#006d32", "#26a641", "#39d353"];

export const TEXT_SHADES: readonly string[] = ["·", "░", "▒", "▓", "█"];

export const PADDING_GLYPH = " ";
