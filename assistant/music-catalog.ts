/**
 * Music catalog adapters backed by yt-dlp and ffmpeg.
 *
 * - search: `yt-dlp --dump-json --flat-playlist "ytsearchN:<query>"`, one JSON
 *   object per line, in the catalog's ranking order
 * - stream URL: `yt-dlp -f bestaudio/best -g <watch url>`
 * - transcode: `ffmpeg -i <url> ... -f mp3 <dest>` (192 kbps MP3)
 *
 * All three run as child processes through an injectable ProcessRunner so the
 * engine tests can stand in for the tools.
 */

import { spawn } from "child_process";

import { isRecord } from "./music-cache.js";

import type { SongCandidate } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

const SEARCH_TIMEOUT_MS = 30_000;
const EXTRACT_TIMEOUT_MS = 60_000;
const TRANSCODE_TIMEOUT_MS = 10 * 60_000;

/** Max characters of tool stderr carried into an error message */
const STDERR_TAIL = 500;

// ============================================================================
// INTERFACES
// ============================================================================

/** Result of a finished child process */
export interface ProcessResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/** Runs a command to completion */
export type ProcessRunner = (cmd: string, args: string[], timeoutMs: number) => Promise<ProcessResult>;

/** Song search */
export interface MusicCatalog {
  /** Candidates in ranking order. Rejects when the lookup itself fails. */
  search: (query: string, limit: number) => Promise<SongCandidate[]>;
}

/** Resolves a playable stream URL for a catalog entry */
export interface StreamExtractor {
  resolveStreamUrl: (videoId: string) => Promise<string>;
}

/** Downloads and transcodes a stream into an MP3 file */
export interface Transcoder {
  transcode: (streamUrl: string, destPath: string) => Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the yt-dlp catalog and stream extractor.
 *
 * @param run - Process runner (defaults to spawning the real tool)
 * @returns Catalog search plus stream URL extraction
 */
export function createYtDlpCatalog(run: ProcessRunner = runProcess): MusicCatalog & StreamExtractor {
  async function search(query: string, limit: number): Promise<SongCandidate[]> {
    const result = await run(
      "yt-dlp",
      ["--dump-json", "--flat-playlist", "--no-warnings", `ytsearch${limit}:${query}`],
      SEARCH_TIMEOUT_MS
    );
    if (result.code !== 0) {
      throw new Error(`yt-dlp search exited with code ${result.code}: ${tail(result.stderr)}`);
    }
    return parseSearchOutput(result.stdout).slice(0, limit);
  }

  async function resolveStreamUrl(videoId: string): Promise<string> {
    const result = await run(
      "yt-dlp",
      ["-f", "bestaudio/best", "-g", "--no-warnings", watchUrl(videoId)],
      EXTRACT_TIMEOUT_MS
    );
    if (result.code !== 0) {
      throw new Error(`yt-dlp extraction exited with code ${result.code}: ${tail(result.stderr)}`);
    }
    const url = result.stdout.split("\n").map((l) => l.trim()).find((l) => l.length > 0);
    if (!url) throw new Error(`No audio stream found for ${videoId}`);
    return url;
  }

  return { search, resolveStreamUrl };
}

/**
 * Create the ffmpeg transcoder.
 *
 * @param run - Process runner (defaults to spawning the real tool)
 * @returns A Transcoder writing 192 kbps MP3
 */
export function createFfmpegTranscoder(run: ProcessRunner = runProcess): Transcoder {
  async function transcode(streamUrl: string, destPath: string): Promise<void> {
    const result = await run(
      "ffmpeg",
      [
        "-hide_banner", "-loglevel", "error",
        "-i", streamUrl,
        "-vn",
        "-acodec", "libmp3lame",
        "-ab", "192k",
        "-f", "mp3",
        "-y", destPath,
      ],
      TRANSCODE_TIMEOUT_MS
    );
    if (result.code !== 0) {
      throw new Error(`ffmpeg exited with code ${result.code}: ${tail(result.stderr)}`);
    }
  }

  return { transcode };
}

/**
 * Parse yt-dlp `--dump-json` output (one object per line) into candidates.
 * Lines that are not JSON objects with an id are skipped.
 *
 * @param stdout - Raw tool output
 * @returns Candidates in output order
 */
export function parseSearchOutput(stdout: string): SongCandidate[] {
  const candidates: SongCandidate[] = [];
  for (const line of stdout.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed.startsWith("{")) continue;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch {
      continue;
    }
    if (!isRecord(parsed) || typeof parsed.id !== "string" || !parsed.id) continue;

    candidates.push({
      videoId: parsed.id,
      title: firstString(parsed.track, parsed.title) ?? "Unknown Title",
      artist: firstString(parsed.artist, parsed.channel, parsed.uploader) ?? "Unknown Artist",
      durationSeconds: typeof parsed.duration === "number" ? Math.round(parsed.duration) : null,
    });
  }
  return candidates;
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Spawn a command and collect its output. Kills the process and rejects
 * when it outlives the timeout.
 */
export function runProcess(cmd: string, args: string[], timeoutMs: number): Promise<ProcessResult> {
  return new Promise<ProcessResult>((resolve, reject) => {
    const proc = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    const timer = setTimeout(() => {
      proc.kill("SIGKILL");
      reject(new Error(`${cmd} timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    proc.stdout?.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr?.on("data", (chunk: Buffer) => stderr.push(chunk));
    proc.on("error", (err) => {
      clearTimeout(timer);
      reject(new Error(`${cmd} failed to start: ${err.message}`));
    });
    proc.on("close", (code) => {
      clearTimeout(timer);
      resolve({
        code,
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
      });
    });
  });
}

function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

function firstString(...values: unknown[]): string | null {
  for (const value of values) {
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return null;
}

function tail(text: string): string {
  const trimmed = text.trim();
  return trimmed.length > STDERR_TAIL ? trimmed.slice(-STDERR_TAIL) : trimmed;
}
