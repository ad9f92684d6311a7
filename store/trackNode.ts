/**
 * Track <-> `<track>` element, in the object form fast-xml-parser reads and builds.
 * Element names follow the submissions file format; the title lives in `<track>`.
 */

import { z } from "zod";
import { asDuration, timestampFromUnixSeconds, toUnixSeconds } from "../domain/core.js";
import type { Track } from "../domain/track.js";
import { createTrack } from "../domain/track.js";

/** Children of one `<track>` element, in write order. */
export interface TrackNode {
  artist?: string;
  albumArtist: string;
  album: string;
  track: string;
  trackNumber: string;
  duration: string;
  timestamp?: string;
  mbid: string;
  source: string;
}

const unsigned = z.string().regex(/^\d+$/);

// Unknown children are dropped; files written by newer clients still load.
const trackNodeSchema = z.object({
  artist: z.string().optional(),
  albumArtist: z.string().optional(),
  album: z.string().optional(),
  track: z.string().optional(),
  trackNumber: unsigned.optional(),
  duration: unsigned.optional(),
  timestamp: z.string().optional(),
  mbid: z.string().optional(),
  source: z.string().optional(),
});

export function trackToNode(track: Track): TrackNode {
  return {
    ...(track.artist !== null ? { artist: track.artist } : {}),
    albumArtist: track.albumArtist,
    album: track.album,
    track: track.title,
    trackNumber: String(track.trackNumber),
    duration: String(track.duration),
    ...(track.timestamp !== null ? { timestamp: String(toUnixSeconds(track.timestamp)) } : {}),
    mbid: track.mbid,
    source: track.source,
  };
}

/** Returns null when the node is not a usable `<track>` element. */
export function trackFromNode(node: unknown): Track | null {
  const parsed = trackNodeSchema.safeParse(node);
  if (!parsed.success) return null;

  const n = parsed.data;
  const seconds = n.timestamp !== undefined && /^\d+$/.test(n.timestamp) ? Number(n.timestamp) : null;

  return createTrack({
    artist: n.artist ?? null,
    albumArtist: n.albumArtist,
    album: n.album,
    title: n.track,
    trackNumber: n.trackNumber !== undefined ? Number(n.trackNumber) : undefined,
    duration: n.duration !== undefined ? asDuration(Number(n.duration)) : undefined,
    timestamp: seconds !== null ? timestampFromUnixSeconds(seconds) : null,
    mbid: n.mbid,
    source: n.source,
  });
}
