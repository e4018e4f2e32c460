import { consola, LogLevels, type ConsolaInstance } from "consola";
import type { LogLevelName } from "./types/config.js";

export type Logger = ConsolaInstance;

export const logger: Logger = consola.withTag("portwire");

/** Child logger for one component, e.g. `portwire:engine`. */
export function componentLogger(component: string): Logger {
  return logger.withTag(component);
}

const LEVELS: Record<LogLevelName, number> = {
  silent: LogLevels.silent,
  error: LogLevels.error,
  warn: LogLevels.warn,
  info: LogLevels.info,
  debug: LogLevels.debug,
};

export function setLogLevel(level: LogLevelName): void {
  consola.level = LEVELS[level];
  logger.level = LEVELS[level];
}
