/**
 * Content-addressed music cache.
 *
 * Songs are stored as `<cacheDir>/<id>.mp3` where the id is derived from the
 * (videoId, title, artist) triple. `<cacheDir>/index.json` maps ids to
 * metadata and play counts. A song counts as cached only when it is in the
 * index AND its file exists with a nonzero size.
 *
 * Responsibilities:
 * - Derive song ids
 * - Load the index (an unreadable index is logged and treated as empty)
 * - Persist the index atomically, one write at a time
 * - Record downloads and plays
 * - Discard partial downloads
 * - Summarize cache contents
 */

import { createHash } from "crypto";
import { mkdir, readFile, rename, rm, stat, writeFile } from "fs/promises";
import { join } from "path";

import { formatTimestamp } from "./event-log.js";

import type { CacheEntry, CacheInfo, LogFn, SongCandidate } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const INDEX_FILE = "index.json";

/** Length of a song id in hex characters */
const SONG_ID_LENGTH = 12;

/** Number of entries reported in CacheInfo.mostPlayed */
const MOST_PLAYED_COUNT = 5;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Handle to an opened music cache.
 */
export interface MusicCache {
  readonly cacheDir: string;
  /** Final file path for a song id */
  pathFor: (id: string) => string;
  /** Temporary path a download is written to before the rename */
  partialPathFor: (id: string) => string;
  /** Index entry for an id, if any */
  getEntry: (id: string) => CacheEntry | null;
  /** In the index, on disk, and nonempty */
  isCached: (id: string) => Promise<boolean>;
  /** Add (or replace) the entry for a freshly downloaded song */
  recordDownload: (id: string, candidate: SongCandidate) => Promise<CacheEntry>;
  /** Bump the play count of a cached song */
  recordPlay: (id: string) => Promise<CacheEntry | null>;
  /** Delete the partial and final files of a failed download */
  discard: (id: string) => Promise<void>;
  info: () => Promise<CacheInfo>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Derive the song id: first 12 hex chars of md5 over the lowercased
 * `${videoId}_${title}_${artist}`.
 *
 * @returns 12-character hex id
 */
export function songIdFor(videoId: string, title: string, artist: string): string {
  return createHash("md5")
    .update(`${videoId}_${title}_${artist}`.toLowerCase())
    .digest("hex")
    .slice(0, SONG_ID_LENGTH);
}

/**
 * Open (and create if needed) the cache directory and load its index.
 *
 * @param cacheDir - Cache directory
 * @param log - Event logger
 * @param now - Clock, injectable for tests
 * @returns A MusicCache
 */
export async function openMusicCache(
  cacheDir: string,
  log: LogFn,
  now: () => Date = () => new Date()
): Promise<MusicCache> {
  await mkdir(cacheDir, { recursive: true });
  const indexPath = join(cacheDir, INDEX_FILE);
  const index = await loadIndex(indexPath, log);
  let writeChain: Promise<void> = Promise.resolve();

  log("CACHE_INIT", `Cache directory ready: ${cacheDir} (${index.size} songs)`);

  const pathFor = (id: string): string => join(cacheDir, `${id}.mp3`);
  const partialPathFor = (id: string): string => join(cacheDir, `${id}.mp3.part`);

  /** Queue an atomic write of the current index */
  function persist(): Promise<void> {
    const next = writeChain.then(async () => {
      const tmpPath = `${indexPath}.${process.pid}.tmp`;
      const body = JSON.stringify(Object.fromEntries(index), null, 2);
      await writeFile(tmpPath, body + "\n", "utf-8");
      await rename(tmpPath, indexPath);
    });
    // A failed write must not wedge later writes
    writeChain = next.catch((err: unknown) => {
      log("CACHE_ERROR", `Error saving index: ${errorMessage(err)}`);
    });
    return next;
  }

  /** Set an entry and persist it; the entry is rolled back if the write fails */
  async function commit(id: string, entry: CacheEntry): Promise<void> {
    const previous = index.get(id);
    index.set(id, entry);
    try {
      await persist();
    } catch (err) {
      if (index.get(id) === entry) {
        if (previous) index.set(id, previous);
        else index.delete(id);
      }
      throw err;
    }
  }

  function getEntry(id: string): CacheEntry | null {
    return index.get(id) ?? null;
  }

  async function isCached(id: string): Promise<boolean> {
    if (!index.has(id)) return false;
    return (await fileSize(pathFor(id))) > 0;
  }

  async function recordDownload(id: string, candidate: SongCandidate): Promise<CacheEntry> {
    const date = now();
    const stamp = formatTimestamp(date);
    const entry: CacheEntry = {
      videoId: candidate.videoId,
      title: candidate.title,
      artist: candidate.artist,
      cachedAt: stamp,
      cachedTimestamp: Math.floor(date.getTime() / 1000),
      playCount: (index.get(id)?.playCount ?? 0) + 1,
      lastPlayed: stamp,
    };
    await commit(id, entry);
    return entry;
  }

  async function recordPlay(id: string): Promise<CacheEntry | null> {
    const existing = index.get(id);
    if (!existing) return null;
    const entry: CacheEntry = {
      ...existing,
      playCount: existing.playCount + 1,
      lastPlayed: formatTimestamp(now()),
    };
    await commit(id, entry);
    return entry;
  }

  async function discard(id: string): Promise<void> {
    await rm(partialPathFor(id), { force: true });
    await rm(pathFor(id), { force: true });
  }

  async function info(): Promise<CacheInfo> {
    let totalBytes = 0;
    for (const id of index.keys()) {
      totalBytes += await fileSize(pathFor(id));
    }
    const mostPlayed = [...index.entries()]
      .sort((a, b) => b[1].playCount - a[1].playCount)
      .slice(0, MOST_PLAYED_COUNT)
      .map(([id, entry]) => ({ id, entry }));

    return {
      totalSongs: index.size,
      totalSizeMb: Math.round((totalBytes / (1024 * 1024)) * 100) / 100,
      cacheDir,
      mostPlayed,
    };
  }

  return {
    cacheDir,
    pathFor,
    partialPathFor,
    getEntry,
    isCached,
    recordDownload,
    recordPlay,
    discard,
    info,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Read and validate the index file. Missing file means an empty cache;
 * unparseable content is logged and also yields an empty cache. Entries
 * with the wrong shape are skipped.
 */
async function loadIndex(indexPath: string, log: LogFn): Promise<Map<string, CacheEntry>> {
  const index = new Map<string, CacheEntry>();

  let raw: string;
  try {
    raw = await readFile(indexPath, "utf-8");
  } catch (err) {
    if (isNotFound(err)) return index;
    log("CACHE_ERROR", `Error loading index: ${errorMessage(err)}`);
    return index;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    log("CACHE_ERROR", `Error loading index: ${errorMessage(err)}`);
    return index;
  }

  if (!isRecord(parsed)) {
    log("CACHE_ERROR", "Error loading index: not a JSON object");
    return index;
  }

  for (const [id, value] of Object.entries(parsed)) {
    const entry = toCacheEntry(value);
    if (entry) index.set(id, entry);
    else log("CACHE_ERROR", `Skipping malformed index entry ${id}`);
  }
  return index;
}

function toCacheEntry(value: unknown): CacheEntry | null {
  if (!isRecord(value)) return null;
  const { videoId, title, artist, cachedAt, cachedTimestamp, playCount, lastPlayed } = value;
  if (
    typeof videoId !== "string" ||
    typeof title !== "string" ||
    typeof artist !== "string" ||
    typeof cachedAt !== "string" ||
    typeof cachedTimestamp !== "number" ||
    typeof playCount !== "number" ||
    typeof lastPlayed !== "string"
  ) {
    return null;
  }
  return { videoId, title, artist, cachedAt, cachedTimestamp, playCount, lastPlayed };
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Size of a file in bytes, 0 when it does not exist */
async function fileSize(path: string): Promise<number> {
  try {
    return (await stat(path)).size;
  } catch (err) {
    if (isNotFound(err)) return 0;
    throw err;
  }
}

function isNotFound(err: unknown): boolean {
  return isRecord(err) && err.code === "ENOENT";
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
