import { config, LogLevel } from "../config";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

// Thin console wrapper; `scope` ends up as the bracketed prefix on every line.
export function createLogger(scope: string, level: LogLevel = config.logLevel): Logger {
  const enabled = (l: LogLevel) => LEVEL_ORDER[l] >= LEVEL_ORDER[level];
  const prefix = (l: LogLevel) => `${new Date().toISOString()} ${l.toUpperCase()} [${scope}]`;

  return {
    debug: (message, ...details) => {
      if (enabled("debug")) console.debug(`${prefix("debug")} ${message}`, ...details);
    },
    info: (message, ...details) => {
      if (enabled("info")) console.log(`${prefix("info")} ${message}`, ...details);
    },
    warn: (message, ...details) => {
      if (enabled("warn")) console.warn(`${prefix("warn")} ${message}`, ...details);
    },
    error: (message, ...details) => {
      if (enabled("error")) console.error(`${prefix("error")} ${message}`, ...details);
    }
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined
};
