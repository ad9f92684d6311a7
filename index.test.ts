import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync } from "node:fs";
import path from "node:path";
import os from "node:os";
import { loggerTest } from "@foxxmd/logging";
import { asDuration, asTimestamp, createTrack, openScrobbleCache, ValidationError } from "./index.js";

const NOW = Date.UTC(2026, 5, 15, 12, 0, 0);

describe("openScrobbleCache", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(path.join(os.tmpdir(), "open-"));
  });

  afterEach(() => {
    if (existsSync(dir)) {
      rmSync(dir, { recursive: true, force: true });
    }
  });

  it("opens a cache under the given directory", () => {
    const cache = openScrobbleCache("bob", { dir, product: "test-app", logger: loggerTest, now: () => NOW });
    expect(cache.path()).toBe(path.join(dir, "bob_subs_cache.xml"));

    const track = createTrack({
      artist: "Galaxie 500",
      title: "Tugboat",
      duration: asDuration(236),
      timestamp: asTimestamp(NOW - 60_000),
    });
    cache.add([track]);
    expect(readFileSync(cache.path(), "utf8")).toContain('product="test-app"');
  });

  it("applies the minimum length option", () => {
    const cache = openScrobbleCache("bob", { dir, logger: loggerTest, now: () => NOW, minScrobbleLength: 300 });
    const result = cache.add([
      createTrack({ artist: "Galaxie 500", title: "Tugboat", duration: asDuration(236), timestamp: asTimestamp(NOW) }),
    ]);
    expect(result.rejected.map((r) => r.reason)).toEqual(["TooShort"]);
  });

  it("rejects an empty username", () => {
    expect(() => openScrobbleCache("", { dir, logger: loggerTest })).toThrow(ValidationError);
  });
});
