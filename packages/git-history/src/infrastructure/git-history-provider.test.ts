import { describe, expect, it } from "vitest";
import type { GitHistoryProgressEvent } from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { buildGitLogArgs, GitCliHistoryProvider } from "./git-history-provider.js";

type Response = { output: string } | { error: GitCommandError };

class StubGitCommandClient implements GitCommandClient {
  readonly calls: (readonly string[])[] = [];

  constructor(private readonly responses: Readonly<Record<string, Response>>) {}

  run(_repositoryPath: string, args: readonly string[]): string {
    this.calls.push(args);
    const command = args.includes("log") ? "log" : (args[0] ?? "");
    const response = this.responses[command];
    if (response === undefined) {
      throw new GitCommandError(`unexpected git command: ${args.join(" ")}`, args);
    }

    if ("error" in response) {
      throw response.error;
    }

    return response.output;
  }
}

describe("GitCliHistoryProvider", () => {
  it("detects work trees and treats 'not a git repository' as a negative answer", () => {
    const inside = new GitCliHistoryProvider(new StubGitCommandClient({ "rev-parse": { output: "true\n" } }));
    const outside = new GitCliHistoryProvider(
      new StubGitCommandClient({
        "rev-parse": {
          error: new GitCommandError("Command failed", ["rev-parse"], "fatal: not a git repository (or any parent)"),
        },
      }),
    );

    expect(inside.isGitRepository("/repo")).toBe(true);
    expect(outside.isGitRepository("/tmp")).toBe(false);
  });

  it("rethrows unrelated git failures", () => {
    const provider = new GitCliHistoryProvider(
      new StubGitCommandClient({
        "rev-parse": { error: new GitCommandError("spawn git ENOENT", ["rev-parse"]) },
      }),
    );

    expect(() => provider.isGitRepository("/repo")).toThrowError(GitCommandError);
  });

  it("parses git log output and reports progress", () => {
    const client = new StubGitCommandClient({
      log: {
        output: "\u001eabc123\u001f2024-01-01T23:30:00+02:00\u001fAlice\u001falice@example.com",
      },
    });
    const provider = new GitCliHistoryProvider(client);
    const events: GitHistoryProgressEvent[] = [];

    const commits = provider.getCommitHistory("/repo", { allBranches: false, includeMerges: false }, (event) =>
      events.push(event),
    );

    expect(commits).toHaveLength(1);
    expect(commits[0]).toMatchObject({ hash: "abc123", instant: 1_704_144_600, utcOffsetMinutes: 120 });
    expect(events.map((event) => event.stage)).toEqual([
      "git_log_received",
      "git_log_parse_progress",
      "git_log_parsed",
    ]);
  });

  it("returns no commits for a repository without history", () => {
    const provider = new GitCliHistoryProvider(
      new StubGitCommandClient({
        log: {
          error: new GitCommandError(
            "Command failed",
            ["log"],
            "fatal: your current branch 'main' does not have any commits yet",
          ),
        },
      }),
    );

    expect(provider.getCommitHistory("/repo", { allBranches: false, includeMerges: false })).toEqual([]);
  });
});

describe("buildGitLogArgs", () => {
  it("excludes merges by default and adds --all on request", () => {
    expect(buildGitLogArgs({ allBranches: false, includeMerges: false })).toEqual([
      "-c",
      "core.quotepath=false",
      "log",
      "--use-mailmap",
      "--no-merges",
      "--pretty=format:%x1e%H%x1f%aI%x1f%aN%x1f%aE",
    ]);
    expect(buildGitLogArgs({ allBranches: true, includeMerges: true })).toEqual([
      "-c",
      "core.quotepath=false",
      "log",
      "--use-mailmap",
      "--all",
      "--pretty=format:%x1e%H%x1f%aI%x1f%aN%x1f%aE",
    ]);
  });
});
