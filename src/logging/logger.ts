export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type LogRecord = {
  ts: string;
  level: Exclude<LogLevel, "silent">;
  scope: string;
  msg: string;
  [field: string]: unknown;
};

export type LogSink = (record: LogRecord) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error", "silent"];

const stderrSink: LogSink = (record) => {
  process.stderr.write(JSON.stringify(record) + "\n");
};

// Process-wide output settings: the CLI sets the level once from config and
// tests swap the sink. Adapters and parsers only read them.
let threshold: LogLevel = "info";
let sink: LogSink = stderrSink;

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

export function getLogLevel(): LogLevel {
  return threshold;
}

/** Redirect records, e.g. into an array in tests. Pass nothing to restore stderr. */
export function setLogSink(next?: LogSink): void {
  sink = next ?? stderrSink;
}

export type Logger = {
  debug(msg: string, fields?: Record<string, unknown>): void;
  info(msg: string, fields?: Record<string, unknown>): void;
  warn(msg: string, fields?: Record<string, unknown>): void;
  error(msg: string, fields?: Record<string, unknown>): void;
};

/** JSON-lines logger tagged with a scope such as `adapter.gtest`. */
export function createLogger(scope: string): Logger {
  const emit = (level: LogRecord["level"], msg: string, fields?: Record<string, unknown>): void => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) return;
    sink({ ...fields, ts: new Date().toISOString(), level, scope, msg });
  };
  return {
    debug: (msg, fields) => emit("debug", msg, fields),
    info: (msg, fields) => emit("info", msg, fields),
    warn: (msg, fields) => emit("warn", msg, fields),
    error: (msg, fields) => emit("error", msg, fields),
  };
}
