/**
 * Music command grammar and handler.
 *
 * Turns a user transcript into a tagged MusicCommand, detects
 * end-of-conversation phrases, and executes commands against the music engine.
 *
 * Responsibilities:
 * - Normalize transcripts and match them against the command grammar in a
 *   fixed precedence order (stop, pause, resume, skip, status, play)
 * - Match end-of-conversation phrases by case-insensitive substring
 * - Execute a command and describe the outcome as { success, response, action }
 * - Never throw: unexpected engine errors become an "error" result
 */

import type { MusicEngine } from "./music-engine.js";
import type { CommandResult, LogFn, MusicCommand } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Phrases that end a conversation when found anywhere in a transcript */
export const END_PHRASES = [
  "goodbye",
  "bye",
  "see you later",
  "talk to you later",
  "that's all",
  "thanks",
  "thank you",
  "stop",
  "end conversation",
  "quit",
  "exit",
  "done",
  "finished",
] as const;

const STOP_PATTERNS = [
  /\b(stop|end|kill|turn off|shut off) (the |this |that )?(music|song|track|playback)\b/,
  /\bstop playing\b/,
];

const PAUSE_PATTERNS = [
  /\bpause\b/,
  /\bhold (the |this )?(music|song)\b/,
];

const RESUME_PATTERNS = [
  /\b(resume|unpause)\b/,
  /\bcontinue (the |this )?(music|song|playing|playback)\b/,
  /\bkeep playing\b/,
];

const SKIP_PATTERNS = [
  /\bskip\b/,
  /\bnext (song|track)\b/,
];

const STATUS_PATTERNS = [
  /\bwhat('s| is) (playing|this song|the song)\b/,
  /\bwhat song is (this|playing|that)\b/,
  /\bwhich song\b/,
  /\bwhat are we listening to\b/,
];

/** "play X", "can you play X", "put on X" */
const PLAY_PATTERN = /\b(?:play|put on)\s+(.+)$/;

/** Filler stripped from the front and back of a play query */
const QUERY_PREFIX = /^(?:the song|a song|song|some|me)\s+/;
const QUERY_SUFFIX = /\s+(?:please|for me|now)$/;

/** Fallback when a loaded track has no title */
const UNKNOWN_TITLE = "the music";

// ============================================================================
// GRAMMAR
// ============================================================================

/**
 * Parse a transcript into a music command.
 *
 * @param transcript - Raw user transcript
 * @returns The recognized command, or null when the transcript is not one
 */
export function parseMusicCommand(transcript: string): MusicCommand | null {
  const text = normalizeTranscript(transcript);
  if (!text) return null;

  if (STOP_PATTERNS.some((p) => p.test(text))) return { kind: "stop" };
  if (PAUSE_PATTERNS.some((p) => p.test(text))) return { kind: "pause" };
  if (RESUME_PATTERNS.some((p) => p.test(text))) return { kind: "resume" };
  if (SKIP_PATTERNS.some((p) => p.test(text))) return { kind: "skip" };
  if (STATUS_PATTERNS.some((p) => p.test(text))) return { kind: "status" };

  const match = PLAY_PATTERN.exec(text);
  if (match) {
    const query = cleanQuery(match[1] ?? "");
    if (query) return { kind: "play", query };
  }
  return null;
}

/**
 * Find the first end-of-conversation phrase contained in a transcript.
 *
 * @param transcript - Raw user transcript
 * @returns The matched phrase, or null
 */
export function matchEndPhrase(transcript: string): string | null {
  const text = transcript.toLowerCase().replace(/’/g, "'");
  return END_PHRASES.find((phrase) => text.includes(phrase)) ?? null;
}

/**
 * Lowercase, map everything except letters, digits and apostrophes to
 * spaces, and collapse runs of whitespace.
 *
 * @param transcript - Raw transcript
 * @returns Normalized text
 */
export function normalizeTranscript(transcript: string): string {
  return transcript
    .toLowerCase()
    .replace(/’/g, "'")
    .replace(/[^a-z0-9' ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function cleanQuery(raw: string): string {
  let query = raw.trim();
  let previous = "";
  while (query !== previous) {
    previous = query;
    query = query.replace(QUERY_PREFIX, "").replace(QUERY_SUFFIX, "").trim();
  }
  return query;
}

// ============================================================================
// HANDLER
// ============================================================================

/** Engine operations the command handler needs */
export type CommandEngine = Pick<MusicEngine, "playSearchResult" | "pause" | "resume" | "stop" | "getStatus">;

/**
 * Executes music commands against the engine.
 */
export interface MusicCommandHandler {
  /** Run one command. Never rejects. */
  execute: (command: MusicCommand) => Promise<CommandResult>;
}

/**
 * Create a music command handler.
 *
 * @param engine - Music engine (or any object with the same operations)
 * @param log - Event logger
 * @returns A MusicCommandHandler
 */
export function createMusicCommandHandler(engine: CommandEngine, log: LogFn): MusicCommandHandler {
  async function play(query: string): Promise<CommandResult> {
    log("MUSIC_COMMAND", `Play request: ${query}`);
    const ok = await engine.playSearchResult(query);
    if (ok) {
      return { success: true, response: `Now playing ${query}.`, action: "play" };
    }
    return {
      success: false,
      response: `Sorry, I couldn't find or play '${query}'. Please try a different song.`,
      action: "play_failed",
    };
  }

  async function pause(): Promise<CommandResult> {
    const status = engine.getStatus();
    if (!status.isPlaying) {
      return { success: false, response: "There's no music currently playing to pause.", action: "pause_no_music" };
    }
    const title = status.currentSong?.title || UNKNOWN_TITLE;
    if (status.status === "paused_for_conversation") {
      // Already silent for the conversation; the engine turns it into a user pause
      await engine.pause();
      return { success: true, response: `Paused ${title}.`, action: "pause" };
    }
    if (status.isPaused) {
      return { success: false, response: "The music is already paused.", action: "pause_already_paused" };
    }
    if (await engine.pause()) {
      return { success: true, response: `Paused ${title}.`, action: "pause" };
    }
    return { success: false, response: "Sorry, I couldn't pause the music.", action: "error" };
  }

  async function resume(): Promise<CommandResult> {
    const status = engine.getStatus();
    if (!status.isPlaying) {
      return {
        success: false,
        response: "There's no music to resume. Try asking me to play a song.",
        action: "resume_no_music",
      };
    }
    if (!status.isPaused) {
      return { success: false, response: "The music is already playing.", action: "resume_not_paused" };
    }
    const title = status.currentSong?.title || UNKNOWN_TITLE;
    if (await engine.resume()) {
      return { success: true, response: `Resumed ${title}.`, action: "resume" };
    }
    return { success: false, response: "Sorry, I couldn't resume the music.", action: "error" };
  }

  async function stop(): Promise<CommandResult> {
    const status = engine.getStatus();
    if (!status.isPlaying) {
      return { success: false, response: "There's no music currently playing to stop.", action: "stop_no_music" };
    }
    const title = status.currentSong?.title || UNKNOWN_TITLE;
    if (await engine.stop()) {
      return { success: true, response: `Stopped ${title}.`, action: "stop" };
    }
    return { success: false, response: "Sorry, I couldn't stop the music.", action: "error" };
  }

  async function skip(): Promise<CommandResult> {
    if (!engine.getStatus().isPlaying) {
      return { success: false, response: "No music is currently playing to skip.", action: "skip_no_music" };
    }
    await engine.stop();
    return { success: true, response: "Skipped. Ask me to play another song.", action: "skip" };
  }

  function status(): CommandResult {
    const current = engine.getStatus();
    if (!current.isPlaying) {
      return { success: true, response: "No music is currently playing.", action: "status" };
    }
    const title = current.currentSong?.title || "an unknown song";
    const verb = current.isPaused ? "paused" : "playing";
    return { success: true, response: `Currently ${verb}: ${title}`, action: "status" };
  }

  async function execute(command: MusicCommand): Promise<CommandResult> {
    try {
      switch (command.kind) {
        case "play":
          return await play(command.query);
        case "pause":
          return await pause();
        case "resume":
          return await resume();
        case "stop":
          return await stop();
        case "skip":
          return await skip();
        case "status":
          return status();
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log("MUSIC_ERROR", `Error in ${command.kind} command: ${message}`);
      return {
        success: false,
        response: "Sorry, I had trouble with the music. Please try again.",
        action: "error",
      };
    }
  }

  return { execute };
}
