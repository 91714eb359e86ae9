/**
 * Unit tests for the music command grammar, end phrases and command handler.
 *
 * Run: npx tsx --test assistant/music-commands.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import {
  parseMusicCommand,
  matchEndPhrase,
  normalizeTranscript,
  createMusicCommandHandler,
  type CommandEngine,
} from "./music-commands.js";

import type { MusicStatus, Song } from "./types.js";

// ============================================================================
// HELPERS
// ============================================================================

const SONG: Song = {
  id: "abc123def456",
  videoId: "vid-1",
  title: "Test Track",
  artist: "Test Artist",
  cachedFilePath: "/tmp/abc123def456.mp3",
  playCount: 1,
  lastPlayedAt: 0,
};

/** Fake engine with a settable status and a record of calls */
function createFakeEngine(status: MusicStatus, playResult = true) {
  const calls: string[] = [];
  const engine: CommandEngine = {
    async playSearchResult(query: string) {
      calls.push(`play:${query}`);
      return playResult;
    },
    async pause() {
      calls.push("pause");
      return true;
    },
    async resume() {
      calls.push("resume");
      return true;
    },
    async stop() {
      calls.push("stop");
      return true;
    },
    getStatus: () => status,
  };
  return { engine, calls };
}

const STOPPED: MusicStatus = { status: "stopped", isPlaying: false, isPaused: false, currentSong: null };
const PLAYING: MusicStatus = { status: "playing", isPlaying: true, isPaused: false, currentSong: SONG };
const PAUSED: MusicStatus = { status: "paused", isPlaying: true, isPaused: true, currentSong: SONG };

// ============================================================================
// GRAMMAR
// ============================================================================

test("normalizeTranscript lowercases, strips punctuation and collapses spaces", () => {
  assert.equal(normalizeTranscript("  What’s   PLAYING?! "), "what's playing");
});

test("play requests capture the query", () => {
  assert.deepEqual(parseMusicCommand("Play Bohemian Rhapsody"), { kind: "play", query: "bohemian rhapsody" });
  assert.deepEqual(parseMusicCommand("Can you play some jazz, please?"), { kind: "play", query: "jazz" });
  assert.deepEqual(parseMusicCommand("Put on the song Yellow Submarine"), { kind: "play", query: "yellow submarine" });
});

test("control commands are recognized", () => {
  assert.deepEqual(parseMusicCommand("Stop the music."), { kind: "stop" });
  assert.deepEqual(parseMusicCommand("stop playing"), { kind: "stop" });
  assert.deepEqual(parseMusicCommand("Pause the song"), { kind: "pause" });
  assert.deepEqual(parseMusicCommand("unpause"), { kind: "resume" });
  assert.deepEqual(parseMusicCommand("Continue the music"), { kind: "resume" });
  assert.deepEqual(parseMusicCommand("next song"), { kind: "skip" });
  assert.deepEqual(parseMusicCommand("What's playing?"), { kind: "status" });
  assert.deepEqual(parseMusicCommand("what song is this"), { kind: "status" });
});

test("precedence puts control commands ahead of play", () => {
  assert.deepEqual(parseMusicCommand("stop playing and play something else"), { kind: "stop" });
  assert.deepEqual(parseMusicCommand("pause and play it later"), { kind: "pause" });
});

test("ordinary conversation is not a command", () => {
  assert.equal(parseMusicCommand("How is the weather today?"), null);
  assert.equal(parseMusicCommand("I like playing football"), null);
  assert.equal(parseMusicCommand("play"), null);
  assert.equal(parseMusicCommand(""), null);
});

test("end phrases match as case-insensitive substrings", () => {
  assert.equal(matchEndPhrase("OK, Goodbye!"), "goodbye");
  assert.equal(matchEndPhrase("thanks a lot"), "thanks");
  assert.equal(matchEndPhrase("I'm done for today"), "done");
  assert.equal(matchEndPhrase("That’s all for now"), "that's all");
  assert.equal(matchEndPhrase("Tell me a joke"), null);
});

// ============================================================================
// HANDLER
// ============================================================================

test("play reports success and failure", async () => {
  const ok = createFakeEngine(STOPPED, true);
  const result = await createMusicCommandHandler(ok.engine, () => {}).execute({ kind: "play", query: "jazz" });
  assert.deepEqual(result, { success: true, response: "Now playing jazz.", action: "play" });
  assert.deepEqual(ok.calls, ["play:jazz"]);

  const failing = createFakeEngine(STOPPED, false);
  const failed = await createMusicCommandHandler(failing.engine, () => {}).execute({ kind: "play", query: "jazz" });
  assert.equal(failed.success, false);
  assert.equal(failed.action, "play_failed");
});

test("pause checks state before calling the engine", async () => {
  const stopped = createFakeEngine(STOPPED);
  const noMusic = await createMusicCommandHandler(stopped.engine, () => {}).execute({ kind: "pause" });
  assert.equal(noMusic.action, "pause_no_music");
  assert.deepEqual(stopped.calls, []);

  const paused = createFakeEngine(PAUSED);
  const already = await createMusicCommandHandler(paused.engine, () => {}).execute({ kind: "pause" });
  assert.deepEqual(already, { success: false, response: "The music is already paused.", action: "pause_already_paused" });

  const playing = createFakeEngine(PLAYING);
  const done = await createMusicCommandHandler(playing.engine, () => {}).execute({ kind: "pause" });
  assert.deepEqual(done, { success: true, response: "Paused Test Track.", action: "pause" });
  assert.deepEqual(playing.calls, ["pause"]);
});

test("resume refuses a playing or absent track", async () => {
  const playing = createFakeEngine(PLAYING);
  const notPaused = await createMusicCommandHandler(playing.engine, () => {}).execute({ kind: "resume" });
  assert.equal(notPaused.action, "resume_not_paused");

  const stopped = createFakeEngine(STOPPED);
  const noMusic = await createMusicCommandHandler(stopped.engine, () => {}).execute({ kind: "resume" });
  assert.equal(noMusic.action, "resume_no_music");

  const paused = createFakeEngine(PAUSED);
  const resumed = await createMusicCommandHandler(paused.engine, () => {}).execute({ kind: "resume" });
  assert.deepEqual(resumed, { success: true, response: "Resumed Test Track.", action: "resume" });
});

test("stop, skip and status describe the current track", async () => {
  const playing = createFakeEngine(PLAYING);
  const handler = createMusicCommandHandler(playing.engine, () => {});

  assert.deepEqual(await handler.execute({ kind: "status" }), {
    success: true,
    response: "Currently playing: Test Track",
    action: "status",
  });
  assert.deepEqual(await handler.execute({ kind: "stop" }), {
    success: true,
    response: "Stopped Test Track.",
    action: "stop",
  });
  assert.equal((await handler.execute({ kind: "skip" })).action, "skip");
  assert.deepEqual(playing.calls, ["stop", "stop"]);

  const stopped = createMusicCommandHandler(createFakeEngine(STOPPED).engine, () => {});
  assert.equal((await stopped.execute({ kind: "stop" })).action, "stop_no_music");
  assert.equal((await stopped.execute({ kind: "skip" })).action, "skip_no_music");
  assert.equal((await stopped.execute({ kind: "status" })).response, "No music is currently playing.");

  const paused = createMusicCommandHandler(createFakeEngine(PAUSED).engine, () => {});
  assert.equal((await paused.execute({ kind: "status" })).response, "Currently paused: Test Track");
});

test("engine exceptions become an error result", async () => {
  const logs: string[] = [];
  const { engine } = createFakeEngine(STOPPED);
  engine.playSearchResult = async () => {
    throw new Error("catalog exploded");
  };

  const result = await createMusicCommandHandler(engine, (type, message) => logs.push(`${type}: ${message}`))
    .execute({ kind: "play", query: "jazz" });

  assert.equal(result.success, false);
  assert.equal(result.action, "error");
  assert.deepEqual(logs, ["MUSIC_COMMAND: Play request: jazz", "MUSIC_ERROR: Error in play command: catalog exploded"]);
});

test("pause during a conversation hands the pause to the user", async () => {
  const conversation: MusicStatus = { ...PAUSED, status: "paused_for_conversation" };
  const fake = createFakeEngine(conversation);

  const result = await createMusicCommandHandler(fake.engine, () => {}).execute({ kind: "pause" });

  assert.deepEqual(result, { success: true, response: "Paused Test Track.", action: "pause" });
  assert.deepEqual(fake.calls, ["pause"]);
});
