// stderr diagnostics, one line per entry, prefixed "[aictx]".

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_TAG: Record<LogLevel, string> = {
  debug: "debug: ",
  info: "",
  warn: "warning: ",
  error: "error: ",
};

export interface LogSink {
  write(chunk: string): unknown;
}

export interface LoggerOptions {
  level?: LogLevel;
  write?: LogSink;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = "info", write = process.stderr } = options;

  function log(entryLevel: LogLevel, message: string): void {
    if (LOG_LEVEL_PRIORITY[entryLevel] < LOG_LEVEL_PRIORITY[level]) return;
    write.write(`[aictx] ${LEVEL_TAG[entryLevel]}${message}\n`);
  }

  return {
    debug: (message) => log("debug", message),
    info: (message) => log("info", message),
    warn: (message) => log("warn", message),
    error: (message) => log("error", message),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = createLogger({
  level: "error",
  write: { write: () => true },
});
