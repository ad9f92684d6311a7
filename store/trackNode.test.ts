import { describe, expect, it } from "vitest";
import { asDuration, asTimestamp } from "../domain/core.js";
import { createTrack } from "../domain/track.js";
import { trackFromNode, trackToNode } from "./trackNode.js";

const full = createTrack({
  artist: "Broadcast",
  albumArtist: "Broadcast",
  album: "Tender Buttons",
  title: "America's Boy",
  trackNumber: 2,
  duration: asDuration(191),
  timestamp: asTimestamp(1_750_000_000_000),
  mbid: "test-mbid",
  source: "P",
});

describe("trackToNode", () => {
  it("writes every field as text, title under <track>", () => {
    expect(trackToNode(full)).toEqual({
      artist: "Broadcast",
      albumArtist: "Broadcast",
      album: "Tender Buttons",
      track: "America's Boy",
      trackNumber: "2",
      duration: "191",
      timestamp: "1750000000",
      mbid: "test-mbid",
      source: "P",
    });
  });

  it("keeps a stable element order", () => {
    expect(Object.keys(trackToNode(full))).toEqual([
      "artist",
      "albumArtist",
      "album",
      "track",
      "trackNumber",
      "duration",
      "timestamp",
      "mbid",
      "source",
    ]);
  });

  it("omits a null artist and a missing timestamp", () => {
    const node = trackToNode(createTrack({ title: "T" }));
    expect("artist" in node).toBe(false);
    expect("timestamp" in node).toBe(false);
  });
});

describe("trackFromNode", () => {
  it("reads what trackToNode writes", () => {
    expect(trackFromNode(trackToNode(full))).toEqual(full);
  });

  it("defaults missing children", () => {
    const track = trackFromNode({ artist: "A", track: "T", duration: "200", timestamp: "1700000000" });
    expect(track).toEqual(
      createTrack({
        artist: "A",
        title: "T",
        duration: asDuration(200),
        timestamp: asTimestamp(1_700_000_000_000),
      })
    );
  });

  it("a missing <artist> element is a null artist, an empty one is empty", () => {
    expect(trackFromNode({ track: "T" })?.artist).toBeNull();
    expect(trackFromNode({ artist: "", track: "T" })?.artist).toBe("");
  });

  it("an unparsable timestamp becomes absent", () => {
    expect(trackFromNode({ artist: "A", track: "T", timestamp: "yesterday" })?.timestamp).toBeNull();
  });

  it("rejects non-numeric duration or track number", () => {
    expect(trackFromNode({ artist: "A", track: "T", duration: "long" })).toBeNull();
    expect(trackFromNode({ artist: "A", track: "T", trackNumber: "-1" })).toBeNull();
  });

  it("rejects nodes that are not elements with children", () => {
    expect(trackFromNode("")).toBeNull();
    expect(trackFromNode(null)).toBeNull();
    expect(trackFromNode([{ artist: "A" }])).toBeNull();
    expect(trackFromNode({ artist: ["A", "B"], track: "T" })).toBeNull();
  });

  it("ignores unknown children", () => {
    expect(trackFromNode({ artist: "A", track: "T", rating: "L" })).toEqual(createTrack({ artist: "A", title: "T" }));
  });
});
