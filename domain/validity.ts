/**
 * Local sanity filter applied before a track is cached.
 * Deliberately looser than the service's own acceptance rules.
 */

import dayjs from "dayjs";
import type { Timestamp } from "./core.js";
import { asTimestamp } from "./core.js";
import type { Track } from "./track.js";
import { neverReached } from "./validation.js";

export type Invalidity =
  | "TooShort"
  | "NoTimestamp"
  | "FromTheFuture"
  | "FromTheDistantPast"
  | "ArtistNameMissing"
  | "TrackNameMissing"
  | "ArtistInvalid";

export type Validity = { readonly valid: true } | { readonly valid: false; readonly reason: Invalidity };

/** Shortest play, in seconds, the service counts as a scrobble. */
export const DEFAULT_MIN_SCROBBLE_LENGTH = 31;

/** Nothing was scrobbled before the service went live. */
export const EARLIEST_SCROBBLE = asTimestamp(Date.UTC(2003, 0, 1));

/** Placeholder names players emit when tags are missing. Compared lower-cased. */
export const PLACEHOLDER_ARTISTS: readonly string[] = ["unknown artist", "unknown", "[unknown]", "[unknown artist]"];

export interface ClassifyOptions {
  readonly minScrobbleLength?: number;
  /** Clock, epoch ms. */
  readonly now?: () => number;
}

interface CheckContext {
  readonly minScrobbleLength: number;
  readonly latestAllowed: Timestamp;
}

type Check = readonly [reason: Invalidity, fails: (track: Track, ctx: CheckContext) => boolean];

const hasTimestamp = (track: Track): track is Track & { readonly timestamp: Timestamp } =>
  track.timestamp !== null && Number.isFinite(track.timestamp);

// Order is significant: the first failing check is the reported reason.
const CHECKS: readonly Check[] = [
  // Also catches NaN and fractional durations, which the file cannot hold.
  ["TooShort", (t, ctx) => !Number.isInteger(t.duration) || !(t.duration >= ctx.minScrobbleLength)],
  ["NoTimestamp", (t) => !hasTimestamp(t)],
  // Server side spam prevention is much tighter; only obviously bad data is weeded out here.
  ["FromTheFuture", (t, ctx) => hasTimestamp(t) && t.timestamp > ctx.latestAllowed],
  ["FromTheDistantPast", (t) => hasTimestamp(t) && t.timestamp < EARLIEST_SCROBBLE],
  ["ArtistNameMissing", (t) => t.artist === null],
  ["TrackNameMissing", (t) => t.title === ""],
  ["ArtistInvalid", (t) => t.artist !== null && PLACEHOLDER_ARTISTS.includes(t.artist.toLowerCase())],
];

/** Classify one track. Invalid input is a normal result, never an exception. */
export function classify(track: Track, options: ClassifyOptions = {}): Validity {
  const now = options.now ?? Date.now;
  const ctx: CheckContext = {
    minScrobbleLength: options.minScrobbleLength ?? DEFAULT_MIN_SCROBBLE_LENGTH,
    latestAllowed: asTimestamp(dayjs(now()).add(1, "month").valueOf()),
  };

  for (const [reason, fails] of CHECKS) {
    if (fails(track, ctx)) return { valid: false, reason };
  }
  return { valid: true };
}

export function describeInvalidity(reason: Invalidity): string {
  switch (reason) {
    case "TooShort":
      return "duration is below the minimum scrobble length or not whole seconds";
    case "NoTimestamp":
      return "timestamp is missing or invalid";
    case "FromTheFuture":
      return "timestamp is more than a month in the future";
    case "FromTheDistantPast":
      return "timestamp predates 2003-01-01";
    case "ArtistNameMissing":
      return "artist name is missing";
    case "TrackNameMissing":
      return "track title is empty";
    case "ArtistInvalid":
      return "artist name is a placeholder";
    default:
      return neverReached(reason, "Unknown invalidity");
  }
}
