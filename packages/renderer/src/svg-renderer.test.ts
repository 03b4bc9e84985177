import { describe, expect, it } from "vitest";
import { januaryHeatmap } from "./__fixtures__/heatmap.js";
import { SvgHeatmapRenderer, cellTitle } from "./svg-renderer.js";

describe("SvgHeatmapRenderer", () => {
  const svg = new SvgHeatmapRenderer().render(januaryHeatmap());
  const lines = svg.split("\n");

  it("sizes the drawing from the number of weeks", () => {
    expect(lines[0]).toBe(
      '<svg xmlns="http://www.w3.org/2000/svg" width="56" height="114" viewBox="0 0 56 114" role="img">',
    );
    expect(lines[1]).toBe("<title>4 commits on 2 active days (max 3 in one day)</title>");
    expect(lines.at(-1)).toBe("</svg>");
  });

  it("draws one square per in-range day", () => {
    expect(lines.filter((line) => line.startsWith("<rect"))).toHaveLength(8);
    expect(lines).toContain(
      '<rect x="28" y="16" width="11" height="11" rx="2" fill="#39d353" data-date="2024-01-01" data-level="4"><title>3 commits on 2024-01-01</title></rect>',
    );
    expect(lines).toContain(
      '<rect x="42" y="16" width="11" height="11" rx="2" fill="#26a641" data-date="2024-01-08" data-level="3"><title>1 commit on 2024-01-08</title></rect>',
    );
    expect(svg).not.toContain('data-date="2024-01-09"');
  });

  it("places month and weekday labels", () => {
    expect(lines).toContain('<text x="28" y="10" font-family="sans-serif" font-size="9" fill="#8b949e">Jan</text>');
    expect(lines).toContain('<text x="0" y="39" font-family="sans-serif" font-size="9" fill="#8b949e">Tue</text>');
  });
});

describe("cellTitle", () => {
  it("names padding cells by date only", () => {
    const paddingCell = januaryHeatmap().weeks[1]?.[1];
    expect(paddingCell === undefined ? null : cellTitle(paddingCell)).toBe("2024-01-09");
  });
});
