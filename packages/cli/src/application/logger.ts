export const LOG_LEVELS = ["silent", "error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

type MessageLevel = Exclude<LogLevel, "silent">;

export type Logger = Readonly<Record<MessageLevel, (message: string) => void>>;

export type LogSink = (line: string) => void;

const noop = (): void => {};

export const createSilentLogger = (): Logger => ({
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
});

const writeToStderr: LogSink = (line) => {
  process.stderr.write(`${line}\n`);
};

export const formatLogLine = (level: MessageLevel, message: string): string =>
  `[commitgrid] ${level.toUpperCase()} ${message}`;

/** Messages above the configured level are dropped; everything else goes to `sink`, one line each. */
export const createStderrLogger = (level: LogLevel, sink: LogSink = writeToStderr): Logger => {
  const limit = LOG_LEVELS.indexOf(level);
  const at = (messageLevel: MessageLevel) =>
    LOG_LEVELS.indexOf(messageLevel) <= limit
      ? (message: string) => sink(formatLogLine(messageLevel, message))
      : noop;

  return {
    error: at("error"),
    warn: at("warn"),
    info: at("info"),
    debug: at("debug"),
  };
};

export const parseLogLevel = (value: string | undefined): LogLevel =>
  LOG_LEVELS.find((level) => level === value?.trim().toLowerCase()) ?? "info";
