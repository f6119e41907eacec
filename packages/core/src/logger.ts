/**
 * logger.ts
 *
 * Levelled, timestamped console logger. Messages are plain strings:
 *   logger.info(`stake ok at ${height} for ${account}`);
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/** Where formatted lines go. Defaults to the console. */
export type LogSink = (level: Exclude<LogLevel, "silent">, line: string) => void;

const consoleSink: LogSink = (level, line) => {
  if (level === "error") console.error(line);
  else if (level === "warn") console.warn(line);
  else console.log(line);
};

export function createLogger(
  scope: string,
  level: LogLevel = "info",
  sink: LogSink = consoleSink
): Logger {
  const threshold = LOG_LEVELS.indexOf(level);

  const write = (at: Exclude<LogLevel, "silent">, message: string) => {
    if (LOG_LEVELS.indexOf(at) < threshold) return;
    sink(at, `[${new Date().toISOString()}] [${at.toUpperCase()}] [${scope}] ${message}`);
  };

  return {
    debug: (message) => write("debug", message),
    info:  (message) => write("info", message),
    warn:  (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}

function levelFromEnv(): LogLevel {
  const raw = process.env.LOG_LEVEL ?? "info";
  return isLogLevel(raw) ? raw : "info";
}

export const logger = createLogger("stakeline", levelFromEnv());
