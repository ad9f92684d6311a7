/**
 * File-backed cache of scrobbles that failed to submit. One XML file per user.
 *
 * Every operation is synchronous and leaves the in-memory list and the file
 * in agreement before it returns. One instance per file per process.
 */

import { existsSync, mkdirSync, readFileSync, renameSync, unlinkSync, writeFileSync } from "node:fs";
import path from "node:path";
import { CacheWriteError } from "../domain/errors.js";
import type { Track } from "../domain/track.js";
import { describeTrack, isCount, isEmptyTrack, tracksEqual } from "../domain/track.js";
import { assert } from "../domain/validation.js";
import type { Invalidity } from "../domain/validity.js";
import { classify, describeInvalidity } from "../domain/validity.js";
import type { Logger } from "../logger.js";
import { parseCacheDocument, serializeCacheDocument } from "./cacheDocument.js";
import { safeId } from "./safeId.js";
import { trackFromNode, trackToNode } from "./trackNode.js";

export interface ScrobbleCacheOptions {
  /** Directory holding the cache file. */
  readonly dir: string;
  /** Written to the `product` attribute of the file. */
  readonly product: string;
  readonly logger: Logger;
  /** Seconds. */
  readonly minScrobbleLength?: number;
  /** Clock, epoch ms. */
  readonly now?: () => number;
}

export interface Rejection {
  readonly track: Track;
  readonly reason: Invalidity;
}

export interface AddResult {
  readonly accepted: readonly Track[];
  readonly rejected: readonly Rejection[];
  /** Valid but empty placeholders, never cached. */
  readonly skipped: readonly Track[];
}

export function cacheFileName(username: string): string {
  return `${safeId(username)}_subs_cache.xml`;
}

export class ScrobbleCache {
  private readonly user: string;
  private readonly file: string;
  private readonly options: ScrobbleCacheOptions;
  private readonly logger: Logger;
  private entries: Track[] = [];

  /** `snapshot` seeds the list instead of reading the file; used by clone(). */
  constructor(username: string, options: ScrobbleCacheOptions, snapshot?: readonly Track[]) {
    assert(username.length > 0, "Scrobble cache needs a username");
    this.user = username;
    this.file = path.join(options.dir, cacheFileName(username));
    this.options = options;
    this.logger = options.logger;
    this.entries = snapshot !== undefined ? [...snapshot] : this.read();
  }

  /** Replace the in-memory list with the file's contents. Never throws for a missing or corrupt file. */
  reload(): void {
    this.entries = this.read();
  }

  /**
   * Cache every valid, non-empty track and persist once for the batch.
   * Invalid tracks are reported in the result, never thrown.
   *
   * @throws ValidationError when a track number is not a non-negative integer; nothing is cached.
   * @throws CacheWriteError when the file cannot be written; accepted tracks stay cached in memory.
   */
  add(candidates: readonly Track[]): AddResult {
    for (const track of candidates) {
      assert(isCount(track.trackNumber), "Track number must be a non-negative integer", {
        track: describeTrack(track),
        trackNumber: track.trackNumber,
      });
    }

    const accepted: Track[] = [];
    const rejected: Rejection[] = [];
    const skipped: Track[] = [];

    for (const track of candidates) {
      const validity = classify(track, {
        minScrobbleLength: this.options.minScrobbleLength,
        now: this.options.now,
      });

      if (!validity.valid) {
        this.logger.warn(`Not caching ${describeTrack(track)}: ${describeInvalidity(validity.reason)} (${validity.reason})`);
        rejected.push({ track, reason: validity.reason });
      } else if (isEmptyTrack(track)) {
        this.logger.debug("Will not cache an empty track");
        skipped.push(track);
      } else {
        accepted.push(track);
      }
    }

    this.entries.push(...accepted);
    this.write();
    return { accepted, rejected, skipped };
  }

  /**
   * Drop every cached track that equals (by value) any of `toRemove`, then persist.
   *
   * NOTE: returns the number of tracks REMAINING in the cache, not the number removed.
   *
   * @throws CacheWriteError when the file cannot be written or deleted.
   */
  remove(toRemove: readonly Track[]): number {
    this.entries = this.entries.filter((cached) => !toRemove.some((t) => tracksEqual(t, cached)));
    this.write();
    return this.entries.length;
  }

  /** Snapshot; changing it does not change the cache. */
  tracks(): Track[] {
    return [...this.entries];
  }

  size(): number {
    return this.entries.length;
  }

  isEmpty(): boolean {
    return this.entries.length === 0;
  }

  path(): string {
    return this.file;
  }

  username(): string {
    return this.user;
  }

  /** Independent copy of the in-memory state. The file is neither read nor written. */
  clone(): ScrobbleCache {
    return new ScrobbleCache(this.user, this.options, this.entries);
  }

  private read(): Track[] {
    let text: string;
    try {
      text = readFileSync(this.file, "utf8");
    } catch (err: unknown) {
      const e = err as NodeJS.ErrnoException;
      if (e?.code === "ENOENT") {
        this.logger.debug(`No cache at ${this.file}`);
      } else {
        this.logger.warn(`Could not read cache ${this.file}, starting empty: ${e?.message ?? String(err)}`);
      }
      return [];
    }

    const nodes = parseCacheDocument(text);
    if (nodes === null) {
      this.logger.warn(`Cache ${this.file} is not well-formed XML, starting empty`);
      return [];
    }

    const loaded: Track[] = [];
    nodes.forEach((node, index) => {
      const track = trackFromNode(node);
      if (track === null) {
        this.logger.warn(`Skipping unreadable track #${index + 1} in ${this.file}`);
        return;
      }
      loaded.push(track);
    });

    this.logger.debug(`Loaded ${loaded.length} cached track(s) from ${this.file}`);
    return loaded;
  }

  private write(): void {
    const tmp = `${this.file}.tmp`;
    try {
      if (this.entries.length === 0) {
        this.deleteFile();
        return;
      }

      mkdirSync(path.dirname(this.file), { recursive: true });
      const xml = serializeCacheDocument(this.options.product, this.entries.map(trackToNode));
      writeFileSync(tmp, xml, "utf8");
      renameSync(tmp, this.file);
      this.logger.debug(`Wrote ${this.entries.length} track(s) to ${this.file}`);
    } catch (err: unknown) {
      this.discardTemp(tmp);
      throw new CacheWriteError(this.file, err);
    }
  }

  private discardTemp(tmp: string): void {
    try {
      unlinkSync(tmp);
    } catch (err: unknown) {
      const e = err as NodeJS.ErrnoException;
      if (e?.code === "ENOENT" || e?.code === "ENOTDIR") return;
      this.logger.warn(`Could not remove ${tmp}: ${e?.message ?? String(err)}`);
    }
  }

  private deleteFile(): void {
    if (!existsSync(this.file)) return;
    try {
      unlinkSync(this.file);
    } catch (err: unknown) {
      const e = err as NodeJS.ErrnoException;
      if (e?.code === "ENOENT") return;
      throw err;
    }
    this.logger.debug(`Removed empty cache ${this.file}`);
  }
}
