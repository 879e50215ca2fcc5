import type { LogLevel } from "./config.js";

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

const noop = (): void => undefined;

export const NOOP_LOGGER: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function createConsoleLogger(prefix = "ledger-tools", level: LogLevel = "info"): Logger {
  const threshold = SEVERITY[level];
  const enabled = (entry: Exclude<LogLevel, "silent">): boolean => SEVERITY[entry] >= threshold;

  return {
    debug: (message, meta) => {
      if (enabled("debug")) console.debug(`[${prefix}] ${message}`, meta ?? "");
    },
    info: (message, meta) => {
      if (enabled("info")) console.info(`[${prefix}] ${message}`, meta ?? "");
    },
    warn: (message, meta) => {
      if (enabled("warn")) console.warn(`[${prefix}] ${message}`, meta ?? "");
    },
    error: (message, meta) => {
      if (enabled("error")) console.error(`[${prefix}] ${message}`, meta ?? "");
    },
  };
}
