/**
 * Tagged diagnostics on stderr
 *
 * Messages are prefixed with the component tag (`[Loader] ...`) and
 * dropped when below the configured `LOG_LEVEL`. The `--verbose` flag
 * raises the level for the rest of the process.
 */

import { LOG_LEVELS, LogLevel, getConfig } from "../config.js";

let levelOverride: LogLevel | undefined;

export function setLogLevel(level: LogLevel | undefined): void {
  levelOverride = level;
}

export function currentLogLevel(): LogLevel {
  return levelOverride ?? getConfig().logLevel;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(currentLogLevel());
}

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(tag: string): Logger {
  const write = (level: LogLevel) => (message: string, ...details: unknown[]) => {
    if (isLevelEnabled(level)) {
      console.error(`[${tag}] ${message}`, ...details);
    }
  };

  return {
    debug: write("debug"),
    info: write("info"),
    warn: write("warn"),
    error: write("error")
  };
}
