import { createHash } from "node:crypto";
import type { CommitEvent, Heatmap } from "@commitgrid/core";
import { resolveHeatmapConfig, serializeHeatmapConfig, type HeatmapConfig } from "../config.js";
import {
  assembleHeatmapWithConfig,
  type AssembleHeatmapInput,
  type HeatmapAssemblyProgressEvent,
} from "./assemble-heatmap.js";

export type HeatmapMemoOptions = {
  maxEntries: number;
};

export type HeatmapMemo = {
  assemble: (
    input: AssembleHeatmapInput,
    onProgress?: (event: HeatmapAssemblyProgressEvent) => void,
  ) => Heatmap;
  has: (input: AssembleHeatmapInput) => boolean;
  size: () => number;
  clear: () => void;
};

const DEFAULT_HEATMAP_MEMO_OPTIONS: HeatmapMemoOptions = {
  maxEntries: 16,
};

/** Order-independent digest of a commit set. */
export const fingerprintCommits = (commits: readonly CommitEvent[]): string => {
  const lines = commits
    .map((commit) => `${commit.instant}:${commit.utcOffsetMinutes}`)
    .sort((a, b) => a.localeCompare(b));

  const hash = createHash("sha256");
  for (const line of lines) {
    hash.update(line);
    hash.update("\n");
  }
  return hash.digest("hex");
};

const memoKey = (input: AssembleHeatmapInput): { key: string; config: HeatmapConfig } => {
  const config = resolveHeatmapConfig(input.config, input.referenceYear);
  return {
    key: `${fingerprintCommits(input.commits)}|${serializeHeatmapConfig(config)}`,
    config,
  };
};

/**
 * Explicit memo for assembled heatmaps. Callers own the instance; entries are
 * evicted oldest-first once `maxEntries` is reached.
 */
export const createHeatmapMemo = (
  options: Partial<HeatmapMemoOptions> = {},
): HeatmapMemo => {
  const { maxEntries } = { ...DEFAULT_HEATMAP_MEMO_OPTIONS, ...options };
  const entries = new Map<string, Heatmap>();

  return {
    assemble: (input, onProgress) => {
      const { key, config } = memoKey(input);
      const cached = entries.get(key);
      if (cached !== undefined) {
        entries.delete(key);
        entries.set(key, cached);
        return cached;
      }

      const heatmap = assembleHeatmapWithConfig(input.commits, config, onProgress);
      entries.set(key, heatmap);
      while (entries.size > maxEntries) {
        const oldest = entries.keys().next();
        if (oldest.done === true) {
          break;
        }
        entries.delete(oldest.value);
      }

      return heatmap;
    },
    has: (input) => entries.has(memoKey(input).key),
    size: () => entries.size,
    clear: () => entries.clear(),
  };
};
