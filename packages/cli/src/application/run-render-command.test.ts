import { describe, expect, it } from "vitest";
import {
  loadCommitHistory,
  type CommitHistoryQuery,
  type GitCommitRecord,
  type GitHistoryProvider,
} from "@commitgrid/git-history";
import type { Logger } from "./logger.js";
import { runRenderCommand, type RenderCommandDependencies } from "./run-render-command.js";

class StubHistoryProvider implements GitHistoryProvider {
  readonly paths: string[] = [];
  readonly queries: CommitHistoryQuery[] = [];

  constructor(
    private readonly isGit: boolean,
    private readonly commits: readonly GitCommitRecord[],
  ) {}

  isGitRepository(repositoryPath: string): boolean {
    this.paths.push(repositoryPath);
    return this.isGit;
  }

  getCommitHistory(_repositoryPath: string, query: CommitHistoryQuery) {
    this.queries.push(query);
    return this.commits;
  }
}

const commit = (hash: string, authorEmail: string, authoredAt: string): GitCommitRecord => ({
  hash,
  authorName: "Test Author",
  authorEmail,
  authoredAt,
  instant: Date.parse(authoredAt) / 1000,
  utcOffsetMinutes: 0,
});

const history = [
  commit("c1", "dev@example.com", "2024-01-01T09:00:00Z"),
  commit("c2", "dev@example.com", "2024-01-01T12:15:00Z"),
  commit("c3", "dev@example.com", "2024-01-01T18:45:00Z"),
  commit("c4", "dev@example.com", "2024-01-08T10:00:00Z"),
  commit("c5", "other@example.org", "2024-01-03T10:00:00Z"),
];

const januaryConfig = {
  rangeStart: { year: 2024, month: 1, day: 1 },
  rangeEnd: { year: 2024, month: 1, day: 8 },
  weekStartDay: "monday" as const,
};

const createRecordingLogger = (): { logger: Logger; lines: string[] } => {
  const lines: string[] = [];
  const record =
    (level: string) =>
    (message: string): void => {
      lines.push(`${level} ${message}`);
    };
  return {
    logger: { error: record("error"), warn: record("warn"), info: record("info"), debug: record("debug") },
    lines,
  };
};

const setup = (isGit: boolean) => {
  const provider = new StubHistoryProvider(isGit, history);
  const writes: { path: string; contents: string }[] = [];
  const dependencies: RenderCommandDependencies = {
    loadHistory: (input, onProgress) => loadCommitHistory(input, provider, onProgress),
    writeFile: (path, contents) => writes.push({ path, contents }),
    cwd: () => "/work",
  };
  return { provider, writes, dependencies };
};

describe("runRenderCommand", () => {
  it("renders the filtered history and logs the summary line", () => {
    const { provider, writes, dependencies } = setup(true);
    const { logger, lines } = createRecordingLogger();

    const result = runRenderCommand(
      "repo",
      { config: januaryConfig, format: "text", author: "dev@" },
      logger,
      dependencies,
    );

    expect(provider.paths).toEqual(["/work/repo"]);
    expect(writes).toEqual([]);
    expect(result.available).toBe(true);
    if (!result.available) {
      return;
    }

    expect(result.outputPath).toBeNull();
    expect(result.heatmap.totalCommits).toBe(4);
    expect(result.rendered.split("\n")).toEqual([
      "    Jan",
      "    █ ▓",
      "Tue ·",
      "    ·",
      "Thu ·",
      "    ·",
      "Sat ·",
      "    ·",
      "Less · ░ ▒ ▓ █ More",
    ]);
    expect(lines).toContain('info history: keeping commits by authors matching "dev@"');
    expect(lines.at(-1)).toBe("info 4 commits on 2 active days (max 3 in one day)");
  });

  it("writes to the output file relative to the working directory", () => {
    const { writes, dependencies } = setup(true);

    const result = runRenderCommand(
      undefined,
      { config: januaryConfig, format: "json", output: "out/heatmap.json" },
      undefined,
      dependencies,
    );

    expect(result.available && result.outputPath).toBe("/work/out/heatmap.json");
    expect(writes).toHaveLength(1);
    expect(writes[0]?.path).toBe("/work/out/heatmap.json");
    const written: unknown = JSON.parse(writes[0]?.contents ?? "null");
    expect(written).toMatchObject({ totalCommits: 5, activeDayCount: 3, rangeStart: "2024-01-01" });
  });

  it("forwards branch and merge flags to the history query", () => {
    const { provider, dependencies } = setup(true);

    runRenderCommand(
      ".",
      { config: januaryConfig, format: "svg", query: { allBranches: true, includeMerges: true } },
      undefined,
      dependencies,
    );

    expect(provider.queries).toEqual([{ allBranches: true, includeMerges: true }]);
  });

  it("reports a directory outside git as unavailable", () => {
    const { dependencies } = setup(false);
    const { logger, lines } = createRecordingLogger();

    const result = runRenderCommand("/elsewhere", { config: januaryConfig, format: "text" }, logger, dependencies);

    expect(result).toEqual({ targetPath: "/elsewhere", available: false, reason: "not_git_repository" });
    expect(lines).toContain("warn history: target path is not a git repository");
  });

  it("lets engine errors reach the caller", () => {
    const { dependencies } = setup(true);

    expect(() =>
      runRenderCommand(
        ".",
        {
          config: { ...januaryConfig, rangeStart: { year: 2024, month: 2, day: 1 } },
          format: "text",
        },
        undefined,
        dependencies,
      ),
    ).toThrow("range start is after range end");
  });
});
