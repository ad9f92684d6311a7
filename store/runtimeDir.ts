/**
 * Per-platform directory for runtime data (caches, queued submissions).
 */

import os from "node:os";
import path from "node:path";

const APP_DIR = "Last.fm";

export function runtimeDataDir(
  platform: NodeJS.Platform = process.platform,
  env: NodeJS.ProcessEnv = process.env,
  home: string = os.homedir()
): string {
  switch (platform) {
    case "darwin":
      return path.posix.join(home, "Library", "Application Support", APP_DIR);
    case "win32": {
      const base = env.LOCALAPPDATA || path.win32.join(home, "AppData", "Local");
      return path.win32.join(base, APP_DIR);
    }
    default: {
      const base = env.XDG_DATA_HOME || path.posix.join(home, ".local", "share");
      return path.posix.join(base, APP_DIR);
    }
  }
}
