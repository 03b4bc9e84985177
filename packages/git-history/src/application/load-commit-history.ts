import type { CommitEvent } from "@commitgrid/core";
import {
  DEFAULT_COMMIT_HISTORY_QUERY,
  toCommitEvent,
  type CommitHistoryQuery,
  type GitCommitRecord,
} from "../domain/commit-types.js";
import type { GitHistoryProgressEvent, GitHistoryProvider } from "./git-history-provider.js";

export type LoadCommitHistoryInput = {
  repositoryPath: string;
  /** Case-insensitive substring matched against author name or email. */
  author?: string;
  query?: Partial<CommitHistoryQuery>;
};

export type CommitHistoryAvailable = {
  targetPath: string;
  available: true;
  commits: readonly GitCommitRecord[];
  events: readonly CommitEvent[];
  filteredOutCommits: number;
};

export type CommitHistoryUnavailable = {
  targetPath: string;
  available: false;
  reason: "not_git_repository";
};

export type CommitHistory = CommitHistoryAvailable | CommitHistoryUnavailable;

export type CommitHistoryProgressEvent =
  | { stage: "checking_git_repository" }
  | { stage: "not_git_repository" }
  | { stage: "loading_commit_history" }
  | { stage: "filtering_authors"; pattern: string }
  | { stage: "history_loaded"; commits: number; filteredOutCommits: number }
  | { stage: "history"; event: GitHistoryProgressEvent };

export const matchesAuthor = (record: GitCommitRecord, pattern: string): boolean => {
  const needle = pattern.trim().toLowerCase();
  if (needle.length === 0) {
    return true;
  }

  return record.authorName.toLowerCase().includes(needle) || record.authorEmail.includes(needle);
};

export const loadCommitHistory = (
  input: LoadCommitHistoryInput,
  historyProvider: GitHistoryProvider,
  onProgress?: (event: CommitHistoryProgressEvent) => void,
): CommitHistory => {
  onProgress?.({ stage: "checking_git_repository" });
  if (!historyProvider.isGitRepository(input.repositoryPath)) {
    onProgress?.({ stage: "not_git_repository" });
    return {
      targetPath: input.repositoryPath,
      available: false,
      reason: "not_git_repository",
    };
  }

  onProgress?.({ stage: "loading_commit_history" });
  const query: CommitHistoryQuery = { ...DEFAULT_COMMIT_HISTORY_QUERY, ...input.query };
  const allCommits = historyProvider.getCommitHistory(input.repositoryPath, query, (event) =>
    onProgress?.({ stage: "history", event }),
  );

  const author = input.author;
  let commits = allCommits;
  if (author !== undefined) {
    onProgress?.({ stage: "filtering_authors", pattern: author });
    commits = allCommits.filter((record) => matchesAuthor(record, author));
  }

  const filteredOutCommits = allCommits.length - commits.length;
  onProgress?.({ stage: "history_loaded", commits: commits.length, filteredOutCommits });

  return {
    targetPath: input.repositoryPath,
    available: true,
    commits,
    events: commits.map(toCommitEvent),
    filteredOutCommits,
  };
};
