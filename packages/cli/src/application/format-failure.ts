import { isHeatmapError } from "@commitgrid/core";
import { GitCommandError } from "@commitgrid/git-history";

/** Single stderr line for failures the command reports instead of crashing; `null` for anything else. */
export const formatFailure = (error: unknown): string | null => {
  if (isHeatmapError(error)) {
    return `[commitgrid] ERROR ${error.stage}: ${error.message}`;
  }

  if (error instanceof GitCommandError) {
    const stderr = error.stderr.trim();
    return `[commitgrid] ERROR git: ${stderr.length > 0 ? stderr : error.message}`;
  }

  return null;
};
