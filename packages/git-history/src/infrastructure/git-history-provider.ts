import { GIT_LOG_FORMAT } from "../domain/git-log-format.js";
import type { CommitHistoryQuery, GitCommitRecord } from "../domain/commit-types.js";
import {
  mapParseProgressToHistoryProgress,
  type GitHistoryProvider,
  type GitHistoryProgressEvent,
} from "../application/git-history-provider.js";
import { GitCommandError, type GitCommandClient } from "./git-command-client.js";
import { parseGitLog } from "../parsing/git-log-parser.js";

const NON_GIT_CODES = ["not a git repository", "not in a git directory"];
const EMPTY_HISTORY_CODES = ["does not have any commits yet", "bad default revision 'head'"];

const errorText = (error: GitCommandError): string => `${error.message}\n${error.stderr}`.toLowerCase();

const isNotGitError = (error: GitCommandError): boolean => {
  const lower = errorText(error);
  return NON_GIT_CODES.some((code) => lower.includes(code));
};

const isEmptyHistoryError = (error: GitCommandError): boolean => {
  const lower = errorText(error);
  return EMPTY_HISTORY_CODES.some((code) => lower.includes(code));
};

export const buildGitLogArgs = (query: CommitHistoryQuery): readonly string[] => [
  "-c",
  "core.quotepath=false",
  "log",
  "--use-mailmap",
  ...(query.includeMerges ? [] : ["--no-merges"]),
  ...(query.allBranches ? ["--all"] : []),
  `--pretty=format:${GIT_LOG_FORMAT}`,
];

export class GitCliHistoryProvider implements GitHistoryProvider {
  constructor(private readonly gitClient: GitCommandClient) {}

  isGitRepository(repositoryPath: string): boolean {
    try {
      const output = this.gitClient.run(repositoryPath, ["rev-parse", "--is-inside-work-tree"]);
      return output.trim() === "true";
    } catch (error) {
      if (error instanceof GitCommandError && isNotGitError(error)) {
        return false;
      }

      throw error;
    }
  }

  getCommitHistory(
    repositoryPath: string,
    query: CommitHistoryQuery,
    onProgress?: (event: GitHistoryProgressEvent) => void,
  ): readonly GitCommitRecord[] {
    let output: string;
    try {
      output = this.gitClient.run(repositoryPath, buildGitLogArgs(query));
    } catch (error) {
      if (error instanceof GitCommandError && isEmptyHistoryError(error)) {
        output = "";
      } else {
        throw error;
      }
    }

    onProgress?.({ stage: "git_log_received", bytes: Buffer.byteLength(output, "utf8") });
    const { commits, skippedRecords } = parseGitLog(output, (event) =>
      onProgress?.(mapParseProgressToHistoryProgress(event)),
    );
    onProgress?.({ stage: "git_log_parsed", commits: commits.length, skippedRecords });
    return commits;
  }
}
