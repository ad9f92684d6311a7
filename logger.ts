/**
 * Application logger. Console only; the host application owns log files.
 */

import { childLogger, loggerApp } from "@foxxmd/logging";
import type { LogLevel, Logger } from "@foxxmd/logging";

export type { Logger } from "@foxxmd/logging";

export function createLogger(level: LogLevel): Logger {
  return loggerApp({ level, console: level, file: false });
}

let shared: Logger | undefined;

/** Process-wide logger, created on first use. Later levels are ignored. */
export function appLogger(level: LogLevel): Logger {
  shared ??= createLogger(level);
  return shared;
}

export function cacheLogger(parent: Logger, username: string): Logger {
  return childLogger(parent, `ScrobbleCache ${username}`);
}
