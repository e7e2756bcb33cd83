export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, error?: unknown, ...args: unknown[]): void;
}

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Console logger that drops messages below `level`.
 * Everything goes to stderr so `search` output on stdout stays clean.
 */
export function createConsoleLogger(level: LogLevel = "info", context?: string): Logger {
  const prefix = (tag: string) => (context ? `[${tag}] (${context})` : `[${tag}]`);
  const enabled = (l: LogLevel) => levelPriority[l] >= levelPriority[level];

  return {
    debug(message, ...args) {
      if (enabled("debug")) console.error(`${prefix("DEBUG")} ${message}`, ...args);
    },
    info(message, ...args) {
      if (enabled("info")) console.error(`${prefix("INFO")} ${message}`, ...args);
    },
    warn(message, ...args) {
      if (enabled("warn")) console.error(`${prefix("WARN")} ${message}`, ...args);
    },
    error(message, error, ...args) {
      if (!enabled("error")) return;
      if (error !== undefined) {
        console.error(`${prefix("ERROR")} ${message}`, error, ...args);
      } else {
        console.error(`${prefix("ERROR")} ${message}`, ...args);
      }
    },
  };
}

export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
};
