export const COMMIT_RECORD_SEPARATOR = "\u001e";
export const COMMIT_FIELD_SEPARATOR = "\u001f";

// hash, strict ISO-8601 author date with offset, author name, author email
export const GIT_LOG_FORMAT = "%x1e%H%x1f%aI%x1f%aN%x1f%aE";
