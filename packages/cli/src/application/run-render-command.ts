import { writeFileSync } from "node:fs";
import { resolve } from "node:path";
import type { Heatmap } from "@commitgrid/core";
import {
  loadCommitHistoryFromGit,
  type CommitHistory,
  type CommitHistoryProgressEvent,
  type CommitHistoryQuery,
  type LoadCommitHistoryInput,
} from "@commitgrid/git-history";
import {
  assembleHeatmap,
  type HeatmapAssemblyProgressEvent,
  type HeatmapConfigInput,
} from "@commitgrid/heatmap-engine";
import {
  createRenderer,
  formatSummaryLine,
  type RenderFormat,
  type RendererOptions,
} from "@commitgrid/renderer";
import { createSilentLogger, type Logger } from "./logger.js";

export type RenderCommandOptions = {
  config: HeatmapConfigInput;
  format: RenderFormat;
  author?: string;
  query?: Partial<CommitHistoryQuery>;
  /** Write the rendered heatmap to this file instead of returning it for stdout. */
  output?: string;
  renderer?: RendererOptions;
};

export type RenderCommandResult =
  | {
      targetPath: string;
      available: true;
      heatmap: Heatmap;
      rendered: string;
      outputPath: string | null;
    }
  | {
      targetPath: string;
      available: false;
      reason: "not_git_repository";
    };

export type RenderCommandDependencies = {
  loadHistory: (
    input: LoadCommitHistoryInput,
    onProgress?: (event: CommitHistoryProgressEvent) => void,
  ) => CommitHistory;
  writeFile: (path: string, contents: string) => void;
  cwd: () => string;
};

const defaultDependencies: RenderCommandDependencies = {
  loadHistory: loadCommitHistoryFromGit,
  writeFile: (path, contents) => writeFileSync(path, contents, "utf8"),
  cwd: () => process.env["INIT_CWD"] ?? process.cwd(),
};

const createHistoryProgressReporter = (
  logger: Logger,
): ((event: CommitHistoryProgressEvent) => void) => {
  let lastParsedRecords = 0;

  return (event) => {
    switch (event.stage) {
      case "checking_git_repository":
        logger.debug("history: checking git repository");
        break;
      case "not_git_repository":
        logger.warn("history: target path is not a git repository");
        break;
      case "loading_commit_history":
        logger.info("history: loading git history");
        break;
      case "filtering_authors":
        logger.info(`history: keeping commits by authors matching "${event.pattern}"`);
        break;
      case "history_loaded":
        logger.debug(
          `history: ${event.commits} commits loaded (${event.filteredOutCommits} filtered out by author)`,
        );
        break;
      case "history":
        if (event.event.stage === "git_log_received") {
          logger.debug(`history: git log loaded (${event.event.bytes} bytes)`);
          break;
        }

        if (event.event.stage === "git_log_parsed") {
          logger.info(`history: parsed ${event.event.commits} commits`);
          if (event.event.skippedRecords > 0) {
            logger.warn(`history: skipped ${event.event.skippedRecords} records with unreadable dates`);
          }
          break;
        }

        if (
          event.event.stage === "git_log_parse_progress" &&
          (event.event.parsedRecords === event.event.totalRecords ||
            event.event.parsedRecords - lastParsedRecords >= 5_000)
        ) {
          lastParsedRecords = event.event.parsedRecords;
          logger.debug(`history: parse progress ${event.event.parsedRecords}/${event.event.totalRecords}`);
        }
        break;
    }
  };
};

const createAssemblyProgressReporter = (
  logger: Logger,
): ((event: HeatmapAssemblyProgressEvent) => void) => {
  return (event) => {
    switch (event.stage) {
      case "config_resolved":
        logger.debug(`heatmap: ${event.levelCount} levels, weeks start on ${event.weekStartDay}`);
        break;
      case "times_normalized":
        logger.debug(`heatmap: normalized ${event.commits} commit times`);
        break;
      case "days_aggregated":
        logger.debug(`heatmap: ${event.activeDays} active days, ${event.inRangeDays} in range`);
        break;
      case "levels_assigned":
        logger.debug(
          `heatmap: level lower bounds ${event.scale.lowerBounds.map((bound) => bound ?? "-").join(", ")}`,
        );
        break;
      case "grid_built":
        logger.info(`heatmap: built ${event.weeks} weeks`);
        break;
    }
  };
};

export const runRenderCommand = (
  inputPath: string | undefined,
  options: RenderCommandOptions,
  logger: Logger = createSilentLogger(),
  dependencies: RenderCommandDependencies = defaultDependencies,
): RenderCommandResult => {
  const targetPath = resolve(dependencies.cwd(), inputPath ?? ".");
  logger.info(`reading repository: ${targetPath}`);

  const history = dependencies.loadHistory(
    {
      repositoryPath: targetPath,
      ...(options.author === undefined ? {} : { author: options.author }),
      ...(options.query === undefined ? {} : { query: options.query }),
    },
    createHistoryProgressReporter(logger),
  );
  if (!history.available) {
    return { targetPath, available: false, reason: history.reason };
  }

  const heatmap = assembleHeatmap(
    { commits: history.events, config: options.config },
    createAssemblyProgressReporter(logger),
  );
  if (heatmap.outOfRangeCommits > 0) {
    logger.debug(`heatmap: ${heatmap.outOfRangeCommits} commits fall outside the requested range`);
  }

  const rendered = createRenderer(options.format, options.renderer).render(heatmap);
  let outputPath: string | null = null;
  if (options.output !== undefined) {
    outputPath = resolve(dependencies.cwd(), options.output);
    dependencies.writeFile(outputPath, `${rendered}\n`);
    logger.info(`wrote ${options.format} heatmap to ${outputPath}`);
  }

  logger.info(formatSummaryLine(heatmap));
  return { targetPath, available: true, heatmap, rendered, outputPath };
};
