/**
 * Track — one play event awaiting submission.
 * Value object: equality is over every field, never identity.
 */

import type { Duration, Timestamp } from "./core.js";
import { asDuration, asTimestamp } from "./core.js";
import { assert } from "./validation.js";

export interface Track {
  /** `null` when the artist is unknown to the player. */
  readonly artist: string | null;
  readonly albumArtist: string;
  readonly album: string;
  readonly title: string;
  /** Non-negative integer, 0 when unknown. */
  readonly trackNumber: number;
  /** Whole seconds. */
  readonly duration: Duration;
  /** When playback started, whole seconds. `null` when the player never stamped it. */
  readonly timestamp: Timestamp | null;
  /** MusicBrainz recording id. */
  readonly mbid: string;
  /** Player source tag, free-form. */
  readonly source: string;
}

export type TrackFields = Partial<Track>;

export const isCount = (n: number) => Number.isInteger(n) && n >= 0;

/**
 * Build a track, defaulting missing fields. The timestamp is truncated to
 * whole seconds, the resolution of the cache file.
 *
 * @throws ValidationError when duration or trackNumber is not a non-negative integer.
 */
export function createTrack(fields: TrackFields = {}): Track {
  if (fields.duration !== undefined) {
    assert(isCount(fields.duration), "Track duration must be whole seconds", { duration: fields.duration });
  }
  if (fields.trackNumber !== undefined) {
    assert(isCount(fields.trackNumber), "Track number must be a non-negative integer", {
      trackNumber: fields.trackNumber,
    });
  }
  return Object.freeze({
    artist: fields.artist ?? null,
    albumArtist: fields.albumArtist ?? "",
    album: fields.album ?? "",
    title: fields.title ?? "",
    trackNumber: fields.trackNumber ?? 0,
    duration: fields.duration ?? asDuration(0),
    timestamp: normalizeTimestamp(fields.timestamp),
    mbid: fields.mbid ?? "",
    source: fields.source ?? "",
  });
}

function normalizeTimestamp(ts: Timestamp | null | undefined): Timestamp | null {
  if (ts === undefined || ts === null || !Number.isFinite(ts)) return null;
  return truncateToSecond(ts);
}

const truncateToSecond = (ts: Timestamp) => asTimestamp(Math.floor(ts / 1000) * 1000);

function sameSecond(a: Timestamp | null, b: Timestamp | null): boolean {
  if (a === null || b === null) return a === b;
  return truncateToSecond(a) === truncateToSecond(b);
}

/** The default-constructed placeholder. */
export function emptyTrack(): Track {
  return createTrack();
}

/** True for a placeholder that carries no play information at all. */
export function isEmptyTrack(track: Track): boolean {
  return (
    track.artist === null &&
    track.title === "" &&
    track.album === "" &&
    track.duration === 0 &&
    track.timestamp === null
  );
}

/** Timestamps compare at whole-second resolution, as stored on disk. */
export function tracksEqual(a: Track, b: Track): boolean {
  return (
    a.artist === b.artist &&
    a.albumArtist === b.albumArtist &&
    a.album === b.album &&
    a.title === b.title &&
    a.trackNumber === b.trackNumber &&
    a.duration === b.duration &&
    sameSecond(a.timestamp, b.timestamp) &&
    a.mbid === b.mbid &&
    a.source === b.source
  );
}

/** "Artist – Title" for log lines. */
export function describeTrack(track: Track): string {
  return `${track.artist ?? "<no artist>"} – ${track.title || "<no title>"}`;
}
