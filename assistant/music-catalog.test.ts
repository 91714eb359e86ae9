/**
 * Unit tests for the yt-dlp/ffmpeg adapters, with a fake process runner.
 *
 * Run: npx tsx --test assistant/music-catalog.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  createYtDlpCatalog,
  createFfmpegTranscoder,
  parseSearchOutput,
  type ProcessResult,
  type ProcessRunner,
} from "./music-catalog.js";

function fakeRunner(result: ProcessResult) {
  const calls: Array<{ cmd: string; args: string[] }> = [];
  const run: ProcessRunner = async (cmd, args) => {
    calls.push({ cmd, args });
    return result;
  };
  return { run, calls };
}

const SEARCH_OUTPUT = [
  JSON.stringify({ id: "vid-1", title: "First Song", channel: "Band One", duration: 201.6 }),
  "WARNING: not json",
  JSON.stringify({ id: "vid-2", title: "Second Song", uploader: "Band Two" }),
  JSON.stringify({ title: "No id" }),
  JSON.stringify({ id: "vid-3", track: "Track Name", title: "Video Title", artist: "Real Artist", duration: 90 }),
  "",
].join("\n");

test("parseSearchOutput keeps ranking order and fills fallbacks", () => {
  assert.deepEqual(parseSearchOutput(SEARCH_OUTPUT), [
    { videoId: "vid-1", title: "First Song", artist: "Band One", durationSeconds: 202 },
    { videoId: "vid-2", title: "Second Song", artist: "Band Two", durationSeconds: null },
    { videoId: "vid-3", title: "Track Name", artist: "Real Artist", durationSeconds: 90 },
  ]);
  assert.deepEqual(parseSearchOutput(JSON.stringify({ id: "x" })), [
    { videoId: "x", title: "Unknown Title", artist: "Unknown Artist", durationSeconds: null },
  ]);
});

test("search runs a limited ytsearch and caps the result", async () => {
  const { run, calls } = fakeRunner({ code: 0, stdout: SEARCH_OUTPUT, stderr: "" });

  const results = await createYtDlpCatalog(run).search("some query", 2);

  assert.deepEqual(calls, [{
    cmd: "yt-dlp",
    args: ["--dump-json", "--flat-playlist", "--no-warnings", "ytsearch2:some query"],
  }]);
  assert.deepEqual(results.map((r) => r.videoId), ["vid-1", "vid-2"]);
});

test("search rejects when the tool fails", async () => {
  const { run } = fakeRunner({ code: 1, stdout: "", stderr: "ERROR: network down\n" });

  await assert.rejects(
    createYtDlpCatalog(run).search("q", 5),
    { message: "yt-dlp search exited with code 1: ERROR: network down" }
  );
});

test("resolveStreamUrl returns the first printed URL", async () => {
  const { run, calls } = fakeRunner({ code: 0, stdout: "\nhttps://media.example/audio\n", stderr: "" });

  const url = await createYtDlpCatalog(run).resolveStreamUrl("vid-1");

  assert.equal(url, "https://media.example/audio");
  assert.deepEqual(calls[0]?.args, [
    "-f", "bestaudio/best", "-g", "--no-warnings", "https://www.youtube.com/watch?v=vid-1",
  ]);

  const empty = fakeRunner({ code: 0, stdout: "  \n", stderr: "" });
  await assert.rejects(createYtDlpCatalog(empty.run).resolveStreamUrl("vid-9"), /No audio stream found for vid-9/);
});

test("transcode writes an mp3 to the destination and surfaces failures", async () => {
  const ok = fakeRunner({ code: 0, stdout: "", stderr: "" });
  await createFfmpegTranscoder(ok.run).transcode("https://media.example/audio", "/cache/id.mp3.part");

  assert.equal(ok.calls[0]?.cmd, "ffmpeg");
  const args = ok.calls[0]?.args ?? [];
  assert.equal(args[args.indexOf("-i") + 1], "https://media.example/audio");
  assert.equal(args[args.indexOf("-f") + 1], "mp3");
  assert.equal(args[args.indexOf("-ab") + 1], "192k");
  assert.equal(args[args.length - 1], "/cache/id.mp3.part");

  const failing = fakeRunner({ code: 1, stdout: "", stderr: "Invalid data" });
  await assert.rejects(
    createFfmpegTranscoder(failing.run).transcode("u", "/cache/x.mp3.part"),
    { message: "ffmpeg exited with code 1: Invalid data" }
  );
});
