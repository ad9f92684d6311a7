/**
 * Environment-driven defaults. Explicit cache options take precedence.
 */

import type { LogLevel } from "@foxxmd/logging";
import { DEFAULT_MIN_SCROBBLE_LENGTH } from "./domain/validity.js";
import { runtimeDataDir } from "./store/runtimeDir.js";

export interface CacheConfig {
  readonly cacheDir: string;
  readonly product: string;
  readonly minScrobbleLength: number;
  readonly logLevel: LogLevel;
}

const LOG_LEVELS: readonly LogLevel[] = ["silent", "fatal", "error", "warn", "info", "log", "verbose", "debug"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function parseLength(value: string | undefined): number {
  if (value === undefined || !/^\d+$/.test(value)) return DEFAULT_MIN_SCROBBLE_LENGTH;
  return Number(value);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CacheConfig {
  const level = env.LOG_LEVEL?.toLowerCase();
  return {
    cacheDir: env.SCROBBLE_CACHE_DIR || runtimeDataDir(process.platform, env),
    product: env.SCROBBLE_CACHE_PRODUCT || "scrobble-cache",
    minScrobbleLength: parseLength(env.SCROBBLE_MIN_LENGTH),
    logLevel: level !== undefined && isLogLevel(level) ? level : "info",
  };
}
