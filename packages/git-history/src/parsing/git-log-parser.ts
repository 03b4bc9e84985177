import { COMMIT_FIELD_SEPARATOR, COMMIT_RECORD_SEPARATOR } from "../domain/git-log-format.js";
import type { GitCommitRecord } from "../domain/commit-types.js";
import { parseIsoTimestamp } from "./iso-timestamp.js";

export type ParseGitLogProgressEvent = {
  parsedRecords: number;
  totalRecords: number;
};

export type ParseGitLogResult = {
  commits: readonly GitCommitRecord[];
  skippedRecords: number;
};

const PROGRESS_INTERVAL = 500;

const parseRecord = (record: string): GitCommitRecord | null => {
  const headerLine = record.split("\n")[0]?.trimEnd() ?? "";
  const headerParts = headerLine.split(COMMIT_FIELD_SEPARATOR);
  if (headerParts.length !== 4) {
    return null;
  }

  const [hash, authoredAt, authorName, authorEmail] = headerParts;
  if (hash === undefined || authoredAt === undefined || authorName === undefined || authorEmail === undefined) {
    return null;
  }

  const timestamp = parseIsoTimestamp(authoredAt);
  if (timestamp === null || hash.length === 0) {
    return null;
  }

  return {
    hash,
    authorName: authorName.trim(),
    authorEmail: authorEmail.trim().toLowerCase(),
    authoredAt,
    instant: timestamp.instant,
    utcOffsetMinutes: timestamp.utcOffsetMinutes,
  };
};

export const parseGitLog = (
  rawLog: string,
  onProgress?: (event: ParseGitLogProgressEvent) => void,
): ParseGitLogResult => {
  const records = rawLog
    .split(COMMIT_RECORD_SEPARATOR)
    .map((record) => record.trim())
    .filter((record) => record.length > 0);

  const commits: GitCommitRecord[] = [];
  let skippedRecords = 0;

  records.forEach((record, index) => {
    const parsed = parseRecord(record);
    if (parsed === null) {
      skippedRecords += 1;
    } else {
      commits.push(parsed);
    }

    const parsedRecords = index + 1;
    if (parsedRecords === records.length || parsedRecords % PROGRESS_INTERVAL === 0) {
      onProgress?.({ parsedRecords, totalRecords: records.length });
    }
  });

  commits.sort((a, b) => a.instant - b.instant || a.hash.localeCompare(b.hash));
  return { commits, skippedRecords };
};
