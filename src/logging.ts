// ---------------------------------------------------------------------------
// Logging – tslog-backed subsystem loggers
// ---------------------------------------------------------------------------
// Every module asks for a child logger tagged with its module name. The level
// starts from GRIDRUN_LOG_LEVEL and can be changed at runtime (the CLI does
// this after parsing flags); children follow the root level.
// ---------------------------------------------------------------------------

import { Logger, type ILogObj } from "tslog";

export const LOG_LEVELS = ["silent", "debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/** tslog numeric levels: 2 debug, 3 info, 4 warn, 5 error. 7 drops everything. */
const TSLOG_MIN_LEVEL: Record<LogLevel, number> = {
  silent: 7,
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export type ChildLogger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

function initialLevel(): LogLevel {
  const fromEnv = process.env.GRIDRUN_LOG_LEVEL?.trim().toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

const rootLogger = new Logger<ILogObj>({
  name: "gridrun",
  type: "pretty",
  minLevel: TSLOG_MIN_LEVEL[initialLevel()],
});

const children = new Map<string, Logger<ILogObj>>();

export function setLogLevel(level: LogLevel): void {
  const minLevel = TSLOG_MIN_LEVEL[level];
  rootLogger.settings.minLevel = minLevel;
  for (const child of children.values()) {
    child.settings.minLevel = minLevel;
  }
}

/**
 * Return the logger for a subsystem. Repeated calls with the same module name
 * share one tslog sub-logger.
 */
export function getChildLogger(bindings: { module: string }): ChildLogger {
  let child = children.get(bindings.module);
  if (!child) {
    child = rootLogger.getSubLogger({ name: bindings.module });
    child.settings.minLevel = rootLogger.settings.minLevel;
    children.set(bindings.module, child);
  }
  const logger = child;
  return {
    debug: (...args) => void logger.debug(...args),
    info: (...args) => void logger.info(...args),
    warn: (...args) => void logger.warn(...args),
    error: (...args) => void logger.error(...args),
  };
}
