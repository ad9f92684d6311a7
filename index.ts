/**
 * Public surface: open a user's scrobble cache and work with its tracks.
 */

import { loadConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { appLogger, cacheLogger } from "./logger.js";
import { ScrobbleCache } from "./store/scrobbleCache.js";

export interface OpenOptions {
  readonly dir?: string;
  readonly product?: string;
  readonly minScrobbleLength?: number;
  readonly now?: () => number;
  readonly logger?: Logger;
}

/**
 * Open (and load) the cache for `username`. Options fall back to the
 * environment configuration; see config.ts.
 */
export function openScrobbleCache(username: string, options: OpenOptions = {}): ScrobbleCache {
  const config = loadConfig();
  const parent = options.logger ?? appLogger(config.logLevel);
  return new ScrobbleCache(username, {
    dir: options.dir ?? config.cacheDir,
    product: options.product ?? config.product,
    minScrobbleLength: options.minScrobbleLength ?? config.minScrobbleLength,
    now: options.now,
    logger: cacheLogger(parent, username || "<none>"),
  });
}

export { ScrobbleCache, cacheFileName } from "./store/scrobbleCache.js";
export type { AddResult, Rejection, ScrobbleCacheOptions } from "./store/scrobbleCache.js";
export { classify, describeInvalidity, DEFAULT_MIN_SCROBBLE_LENGTH, EARLIEST_SCROBBLE, PLACEHOLDER_ARTISTS } from "./domain/validity.js";
export type { ClassifyOptions, Invalidity, Validity } from "./domain/validity.js";
export { createTrack, emptyTrack, isEmptyTrack, tracksEqual } from "./domain/track.js";
export type { Track, TrackFields } from "./domain/track.js";
export { asDuration, asTimestamp } from "./domain/core.js";
export type { Duration, Timestamp } from "./domain/core.js";
export { CacheWriteError, DomainError, ValidationError } from "./domain/errors.js";
export { loadConfig } from "./config.js";
export type { CacheConfig } from "./config.js";
export { appLogger, createLogger } from "./logger.js";
export type { Logger } from "./logger.js";
