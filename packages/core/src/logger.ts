export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogSink = (level: LogLevel, args: readonly unknown[]) => void;

const severity: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const consoleSink: LogSink = (level, args) => {
  switch (level) {
    case "debug":
      console.debug(...args);
      break;
    case "info":
      console.info(...args);
      break;
    case "warn":
      console.warn(...args);
      break;
    default:
      console.error(...args);
  }
};

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Minimum level when nothing sets one: `REVIEWDIFF_LOG_LEVEL`, else `info`. */
export function initialLogLevel(
  env: Record<string, string | undefined> = process.env
): LogLevel {
  const value = env.REVIEWDIFF_LOG_LEVEL?.trim().toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : "info";
}

const state: { sink: LogSink; minimum: LogLevel } = {
  sink: consoleSink,
  minimum: initialLogLevel(),
};

export const setLoggerSink = (next: LogSink | null) => {
  state.sink = next ?? consoleSink;
};

export const setLogLevel = (level: LogLevel) => {
  state.minimum = level;
};

export const getLogLevel = (): LogLevel => state.minimum;

const emit = (level: LogLevel, args: readonly unknown[]) => {
  if (severity[level] >= severity[state.minimum]) {
    state.sink(level, args);
  }
};

export const logger = {
  debug: (...args: readonly unknown[]) => emit("debug", args),
  info: (...args: readonly unknown[]) => emit("info", args),
  warn: (...args: readonly unknown[]) => emit("warn", args),
  error: (...args: readonly unknown[]) => emit("error", args),
};

export type Logger = typeof logger;
