/**
 * Unit tests for the music cache.
 *
 * Run: npx tsx --test assistant/music-cache.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync, existsSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { createHash } from "crypto";

import { openMusicCache, songIdFor } from "./music-cache.js";

import type { SongCandidate } from "./types.js";

const CANDIDATE: SongCandidate = { videoId: "vid-1", title: "Test Track", artist: "Test Artist", durationSeconds: 180 };
const FIXED_NOW = () => new Date(2024, 5, 1, 9, 15, 0);

function withTempDir(fn: (dir: string) => Promise<void>): () => Promise<void> {
  return async () => {
    const dir = mkdtempSync(join(tmpdir(), "music-cache-"));
    try {
      await fn(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  };
}

test("songIdFor is a lowercase md5 prefix of the triple", () => {
  const expected = createHash("md5").update("vid-1_test track_test artist").digest("hex").slice(0, 12);

  assert.equal(songIdFor("vid-1", "Test Track", "Test Artist"), expected);
  assert.equal(songIdFor("VID-1", "TEST TRACK", "test artist"), expected);
  assert.notEqual(songIdFor("vid-2", "Test Track", "Test Artist"), expected);
  assert.match(expected, /^[0-9a-f]{12}$/);
});

test("a recorded download is cached only while its file is present and nonempty", withTempDir(async (dir) => {
  const cache = await openMusicCache(dir, () => {}, FIXED_NOW);
  const id = songIdFor(CANDIDATE.videoId, CANDIDATE.title, CANDIDATE.artist);

  assert.equal(await cache.isCached(id), false);

  writeFileSync(cache.pathFor(id), "mp3 bytes");
  assert.equal(await cache.isCached(id), false, "file without an index entry is not cached");

  const entry = await cache.recordDownload(id, CANDIDATE);
  assert.deepEqual(entry, {
    videoId: "vid-1",
    title: "Test Track",
    artist: "Test Artist",
    cachedAt: "2024-06-01 09:15:00",
    cachedTimestamp: Math.floor(new Date(2024, 5, 1, 9, 15, 0).getTime() / 1000),
    playCount: 1,
    lastPlayed: "2024-06-01 09:15:00",
  });
  assert.equal(await cache.isCached(id), true);

  writeFileSync(cache.pathFor(id), "");
  assert.equal(await cache.isCached(id), false, "empty file is not cached");

  rmSync(cache.pathFor(id));
  assert.equal(await cache.isCached(id), false, "deleted file is not cached");
}));

test("the index persists across opens and play counts accumulate", withTempDir(async (dir) => {
  const id = songIdFor(CANDIDATE.videoId, CANDIDATE.title, CANDIDATE.artist);
  const first = await openMusicCache(dir, () => {}, FIXED_NOW);
  await first.recordDownload(id, CANDIDATE);
  await first.recordPlay(id);

  const reopened = await openMusicCache(dir, () => {}, FIXED_NOW);
  assert.equal(reopened.getEntry(id)?.playCount, 2);
  assert.equal((await reopened.recordPlay(id))?.playCount, 3);
  assert.equal(await reopened.recordPlay("unknown"), null);

  const onDisk = JSON.parse(readFileSync(join(dir, "index.json"), "utf-8"));
  assert.equal(onDisk[id].playCount, 3);
  assert.equal(existsSync(join(dir, `index.json.${process.pid}.tmp`)), false);
}));

test("an unreadable index is logged and treated as empty", withTempDir(async (dir) => {
  writeFileSync(join(dir, "index.json"), "{ not json");
  const logs: string[] = [];

  const cache = await openMusicCache(dir, (type) => logs.push(type), FIXED_NOW);

  assert.equal((await cache.info()).totalSongs, 0);
  assert.deepEqual(logs, ["CACHE_ERROR", "CACHE_INIT"]);
}));

test("malformed entries are skipped", withTempDir(async (dir) => {
  writeFileSync(join(dir, "index.json"), JSON.stringify({
    good: {
      videoId: "v", title: "t", artist: "a", cachedAt: "x", cachedTimestamp: 1, playCount: 1, lastPlayed: "x",
    },
    bad: { videoId: "v" },
  }));

  const cache = await openMusicCache(dir, () => {}, FIXED_NOW);

  assert.notEqual(cache.getEntry("good"), null);
  assert.equal(cache.getEntry("bad"), null);
}));

test("discard removes partial and final files", withTempDir(async (dir) => {
  const cache = await openMusicCache(dir, () => {}, FIXED_NOW);
  writeFileSync(cache.partialPathFor("abc"), "partial");
  writeFileSync(cache.pathFor("abc"), "final");

  await cache.discard("abc");
  await cache.discard("abc");

  assert.equal(existsSync(cache.partialPathFor("abc")), false);
  assert.equal(existsSync(cache.pathFor("abc")), false);
}));

test("info reports totals and the most played songs", withTempDir(async (dir) => {
  const cache = await openMusicCache(dir, () => {}, FIXED_NOW);
  const candidates = ["a", "b", "c", "d", "e", "f"].map((v) => ({ ...CANDIDATE, videoId: v }));

  for (const [i, candidate] of candidates.entries()) {
    const id = songIdFor(candidate.videoId, candidate.title, candidate.artist);
    writeFileSync(cache.pathFor(id), Buffer.alloc(1024 * 1024));
    await cache.recordDownload(id, candidate);
    for (let n = 0; n < i; n++) await cache.recordPlay(id);
  }

  const info = await cache.info();
  assert.equal(info.totalSongs, 6);
  assert.equal(info.totalSizeMb, 6);
  assert.equal(info.cacheDir, dir);
  assert.deepEqual(info.mostPlayed.map((m) => m.entry.videoId), ["f", "e", "d", "c", "b"]);
  assert.deepEqual(info.mostPlayed.map((m) => m.entry.playCount), [6, 5, 4, 3, 2]);
}));

test("a download whose index write fails never enters the index", withTempDir(async (dir) => {
  const logs: string[] = [];
  const cache = await openMusicCache(dir, (type) => logs.push(type), FIXED_NOW);
  const failedId = songIdFor(CANDIDATE.videoId, CANDIDATE.title, CANDIDATE.artist);
  const other: SongCandidate = { videoId: "vid-2", title: "Other Track", artist: "Other Artist", durationSeconds: null };
  const otherId = songIdFor(other.videoId, other.title, other.artist);

  // A directory where the temp file goes makes the write fail
  const tmpPath = join(dir, `index.json.${process.pid}.tmp`);
  mkdirSync(tmpPath);
  await assert.rejects(cache.recordDownload(failedId, CANDIDATE));
  assert.equal(cache.getEntry(failedId), null);
  assert.ok(logs.includes("CACHE_ERROR"));

  rmSync(tmpPath, { recursive: true });
  await cache.recordDownload(otherId, other);

  const saved = JSON.parse(readFileSync(join(dir, "index.json"), "utf-8"));
  assert.deepEqual(Object.keys(saved), [otherId]);
}));
