import type { CommitEvent } from "@commitgrid/core";

export type GitCommitRecord = {
  hash: string;
  authorName: string;
  authorEmail: string;
  /** Author date exactly as git printed it. */
  authoredAt: string;
  instant: number;
  utcOffsetMinutes: number;
};

export type CommitHistoryQuery = {
  allBranches: boolean;
  includeMerges: boolean;
};

export const DEFAULT_COMMIT_HISTORY_QUERY: CommitHistoryQuery = {
  allBranches: false,
  includeMerges: false,
};

export const toCommitEvent = (record: GitCommitRecord): CommitEvent => ({
  instant: record.instant,
  utcOffsetMinutes: record.utcOffsetMinutes,
});
