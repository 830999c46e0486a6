export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let minimumLevel: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export function getLogLevel(): LogLevel {
  return minimumLevel;
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

/**
 * Console logger that prefixes every line with `[tag]`.
 * The level is read on each call so `setLogLevel` applies to existing loggers.
 */
export function createLogger(tag: string): Logger {
  const emit =
    (level: Exclude<LogLevel, "silent">, method: "debug" | "log" | "warn" | "error") =>
    (message: string, ...details: unknown[]) => {
      if (LEVEL_ORDER[level] < LEVEL_ORDER[minimumLevel]) return;
      console[method](`[${tag}] ${message}`, ...details);
    };

  return {
    debug: emit("debug", "debug"),
    info: emit("info", "log"),
    warn: emit("warn", "warn"),
    error: emit("error", "error"),
  };
}
