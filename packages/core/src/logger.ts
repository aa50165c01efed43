import type { Logger } from "./types.js";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3
};

export interface ConsoleLoggerOptions {
  /** Messages below this level are dropped */
  level?: LogLevel;
  /** Sends every level to stderr (console.error), keeping stdout free for data */
  stderrOnly?: boolean;
}

/**
 * Logger backed by `console`, tagging each line with its level.
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const minLevel = LEVEL_ORDER[options.level ?? "info"];
  const stderrOnly = options.stderrOnly ?? false;

  const write = (level: LogLevel, message: string, details: unknown[]) => {
    if (LEVEL_ORDER[level] < minLevel) {
      return;
    }
    const line = `[${level.toUpperCase()}] ${message}`;
    if (stderrOnly || level === "error") {
      console.error(line, ...details);
    } else if (level === "warn") {
      console.warn(line, ...details);
    } else if (level === "info") {
      console.info(line, ...details);
    } else {
      console.debug(line, ...details);
    }
  };

  return {
    debug: (message, ...details) => write("debug", message, details),
    info: (message, ...details) => write("info", message, details),
    warn: (message, ...details) => write("warn", message, details),
    error: (message, ...details) => write("error", message, details)
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {}
};
