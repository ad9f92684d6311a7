import { describe, expect, it } from "vitest";
import { loadConfig } from "./config.js";
import { runtimeDataDir } from "./store/runtimeDir.js";

describe("loadConfig", () => {
  it("reads overrides from the environment", () => {
    const config = loadConfig({
      SCROBBLE_CACHE_DIR: "/var/cache/scrobbles",
      SCROBBLE_CACHE_PRODUCT: "test-player",
      SCROBBLE_MIN_LENGTH: "45",
      LOG_LEVEL: "DEBUG",
    });
    expect(config).toEqual({
      cacheDir: "/var/cache/scrobbles",
      product: "test-player",
      minScrobbleLength: 45,
      logLevel: "debug",
    });
  });

  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      cacheDir: runtimeDataDir(process.platform, {}),
      product: "scrobble-cache",
      minScrobbleLength: 31,
      logLevel: "info",
    });
  });

  it("ignores values it cannot use", () => {
    const config = loadConfig({ SCROBBLE_MIN_LENGTH: "soon", LOG_LEVEL: "loud", SCROBBLE_CACHE_DIR: "" });
    expect(config.minScrobbleLength).toBe(31);
    expect(config.logLevel).toBe("info");
    expect(config.cacheDir).toBe(runtimeDataDir(process.platform, {}));
  });
});
