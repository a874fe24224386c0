/**
 * Diagnostics logger.
 * Standard output belongs to protocol frames, so every line goes to stderr.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  /** Lowest level that is written. Default: info */
  level?: LogLevel;
  /** Where formatted lines go. Default: console.error */
  sink?: (line: string) => void;
}

/**
 * Create a logger writing `[name] LEVEL message` lines.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? "info"];
  const sink = options.sink ?? ((line: string) => console.error(line));

  const emit = (level: LogLevel, message: string): void => {
    if (LEVEL_RANK[level] < threshold) return;
    sink(`[${name}] ${level.toUpperCase()} ${message}`);
  };

  return {
    debug: (message) => emit("debug", message),
    info: (message) => emit("info", message),
    warn: (message) => emit("warn", message),
    error: (message) => emit("error", message),
  };
}

/** Logger that drops everything. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
