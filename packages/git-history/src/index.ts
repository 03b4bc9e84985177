import {
  loadCommitHistory,
  type CommitHistory,
  type CommitHistoryProgressEvent,
  type LoadCommitHistoryInput,
} from "./application/load-commit-history.js";
import { ExecGitCommandClient } from "./infrastructure/git-command-client.js";
import { GitCliHistoryProvider } from "./infrastructure/git-history-provider.js";

export {
  loadCommitHistory,
  matchesAuthor,
  type CommitHistory,
  type CommitHistoryAvailable,
  type CommitHistoryUnavailable,
  type CommitHistoryProgressEvent,
  type LoadCommitHistoryInput,
} from "./application/load-commit-history.js";
export type { GitHistoryProvider, GitHistoryProgressEvent } from "./application/git-history-provider.js";
export type { CommitHistoryQuery, GitCommitRecord } from "./domain/commit-types.js";
export { GitCommandError, type GitCommandClient } from "./infrastructure/git-command-client.js";
export { parseIsoTimestamp } from "./parsing/iso-timestamp.js";

export const loadCommitHistoryFromGit = (
  input: LoadCommitHistoryInput,
  onProgress?: (event: CommitHistoryProgressEvent) => void,
): CommitHistory => {
  const historyProvider = new GitCliHistoryProvider(new ExecGitCommandClient());
  return loadCommitHistory(input, historyProvider, onProgress);
};
