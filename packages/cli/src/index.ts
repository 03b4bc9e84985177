import { Command, Option } from "commander";
import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { fileURLToPath } from "node:url";
import type { CivilDate, Weekday } from "@commitgrid/core";
import type { TimezoneConfig } from "@commitgrid/heatmap-engine";
import { RENDER_FORMATS, type RenderFormat } from "@commitgrid/renderer";
import { formatFailure } from "./application/format-failure.js";
import { LOG_LEVELS, createStderrLogger, parseLogLevel, type LogLevel } from "./application/logger.js";
import {
  buildHeatmapConfigInput,
  parseDateOption,
  parsePositiveIntegerOption,
  parseThresholdsOption,
  parseTimezoneOption,
  parseWeekStartOption,
} from "./application/parse-heatmap-options.js";
import { runRenderCommand } from "./application/run-render-command.js";

const program = new Command();
const packageJsonPath = resolve(dirname(fileURLToPath(import.meta.url)), "../package.json");
const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, "utf8"));
const version =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

program
  .name("commitgrid")
  .description("Calendar heatmap of commit activity in a local git repository")
  .version(version)
  .argument("[path]", "path to the repository")
  .addOption(new Option("--since <date>", "first day of the range (YYYY-MM-DD)").argParser(parseDateOption))
  .addOption(
    new Option("--until <date>", "last day of the range (YYYY-MM-DD, default: today)").argParser(parseDateOption),
  )
  .addOption(
    new Option("--timezone <zone>", "day boundaries: ±HH:MM, utc, or author (each commit's own offset)")
      .argParser(parseTimezoneOption)
      .default(parseTimezoneOption("utc"), "utc"),
  )
  .addOption(
    new Option("--week-start <day>", "weekday of the first grid row")
      .argParser(parseWeekStartOption)
      .default(parseWeekStartOption("sunday"), "sunday"),
  )
  .addOption(
    new Option("--levels <count>", "number of intensity levels, including the empty level")
      .argParser(parsePositiveIntegerOption)
      .default(5),
  )
  .addOption(
    new Option("--thresholds <list>", "fixed lower bounds for levels 2 and up, for example 2,4,8")
      .argParser(parseThresholdsOption)
      .conflicts("quantile"),
  )
  .option("--quantile", "derive level bounds from the distribution of daily counts (default)")
  .option("--author <pattern>", "only count commits whose author name or email contains this text")
  .option("--all", "include commits from every branch, not only the current one")
  .option("--include-merges", "count merge commits")
  .addOption(
    new Option("--format <format>", "output format")
      .choices(RENDER_FORMATS)
      .default("text"),
  )
  .option("--output <file>", "write the heatmap to a file instead of stdout")
  .addOption(
    new Option("--max-cells <count>", "refuse ranges that need more grid cells than this").argParser(
      parsePositiveIntegerOption,
    ),
  )
  .addOption(
    new Option(
      "--log-level <level>",
      "log verbosity: silent, error, warn, info, debug (logs are written to stderr)",
    )
      .choices(LOG_LEVELS)
      .default(parseLogLevel(process.env["COMMITGRID_LOG_LEVEL"])),
  )
  .action(
    (
      path: string | undefined,
      options: {
        since?: CivilDate;
        until?: CivilDate;
        timezone: TimezoneConfig;
        weekStart: Weekday;
        levels: number;
        thresholds?: readonly number[];
        quantile?: boolean;
        author?: string;
        all?: boolean;
        includeMerges?: boolean;
        format: RenderFormat;
        output?: string;
        maxCells?: number;
        logLevel: LogLevel;
      },
    ) => {
      const logger = createStderrLogger(options.logLevel);
      const result = runRenderCommand(
        path,
        {
          config: buildHeatmapConfigInput(options),
          format: options.format,
          query: { allBranches: options.all === true, includeMerges: options.includeMerges === true },
          ...(options.author === undefined ? {} : { author: options.author }),
          ...(options.output === undefined ? {} : { output: options.output }),
        },
        logger,
      );

      if (!result.available) {
        logger.error(`not a git repository: ${result.targetPath}`);
        process.exitCode = 1;
        return;
      }

      if (result.outputPath === null) {
        process.stdout.write(`${result.rendered}\n`);
      }
    },
  );

const executablePath = process.argv[0] ?? "";
const scriptPath = process.argv[1] ?? "";

const argv =
  process.argv[2] === "--"
    ? [executablePath, scriptPath, ...process.argv.slice(3)]
    : process.argv;

try {
  await program.parseAsync(argv);
} catch (error) {
  const failure = formatFailure(error);
  if (failure === null) {
    throw error;
  }

  process.stderr.write(`${failure}\n`);
  process.exitCode = 1;
}
