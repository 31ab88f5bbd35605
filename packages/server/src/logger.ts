/**
 * Root pino logger. Components derive children tagged with their name.
 */

import { pino, type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  /** Default: LOG_LEVEL, or "silent" under NODE_ENV=test, else "info". */
  level?: LevelWithSilent;
  name?: string;
}

const DEFAULT_NAME = "chatrelay";

function defaultLevel(): string {
  return process.env.LOG_LEVEL ?? (process.env.NODE_ENV === "test" ? "silent" : "info");
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? DEFAULT_NAME,
    level: options.level ?? defaultLevel(),
  });
}

/** Child of `parent` (or of a fresh root logger) tagged with `component`. */
export function componentLogger(component: string, parent?: Logger): Logger {
  return (parent ?? createLogger()).child({ component });
}
