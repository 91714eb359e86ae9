/**
 * Music engine: search, cache-backed play, and the playback state machine.
 *
 * States: stopped, playing, paused, paused_for_conversation. The last one is
 * a paused state that remembers the pause was automatic, so that
 * resumeAfterConversation() only resumes what a conversation paused.
 *
 * play() and stop() are serialized through one promise queue. Each started
 * track gets a generation number; the exit callback of an older track never
 * touches the state of a newer one.
 *
 * Responsibilities:
 * - Search the catalog, capped and in ranking order
 * - Play from cache, or extract + transcode + cache on a miss
 * - Drive the playback process (pause/resume/stop)
 * - Report status and cache info
 */

import { rename, stat } from "fs/promises";

import { songIdFor, type MusicCache } from "./music-cache.js";

import type { MusicCatalog, StreamExtractor, Transcoder } from "./music-catalog.js";
import type { PlaybackHandle, PlaybackLauncher } from "./music-playback.js";
import type { CacheInfo, LogFn, MusicStatus, PlaybackStatus, Song, SongCandidate } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Public operations of the music engine.
 */
export interface MusicEngine {
  search: (query: string, limit?: number) => Promise<SongCandidate[]>;
  playSearchResult: (query: string, index?: number) => Promise<boolean>;
  play: (candidate: SongCandidate) => Promise<boolean>;
  pause: () => Promise<boolean>;
  resume: () => Promise<boolean>;
  pauseForConversation: () => Promise<boolean>;
  resumeAfterConversation: () => Promise<boolean>;
  stop: () => Promise<boolean>;
  getStatus: () => MusicStatus;
  getCacheInfo: () => Promise<CacheInfo>;
  cleanup: () => Promise<void>;
}

/**
 * Collaborators of the music engine.
 */
export interface MusicEngineDeps {
  cache: MusicCache;
  catalog: MusicCatalog & StreamExtractor;
  transcoder: Transcoder;
  launch: PlaybackLauncher;
  log: LogFn;
  /** Default number of search candidates */
  searchLimit?: number;
  /** Clock in epoch ms */
  now?: () => number;
}

/** The track currently loaded into a player */
interface LoadedTrack {
  song: Song;
  handle: PlaybackHandle;
  generation: number;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the music engine.
 *
 * @param deps - Cache, catalog, transcoder, player launcher and logger
 * @returns A MusicEngine
 */
export function createMusicEngine(deps: MusicEngineDeps): MusicEngine {
  const { cache, catalog, transcoder, launch, log } = deps;
  const defaultLimit = deps.searchLimit ?? 5;
  const now = deps.now ?? Date.now;

  let status: PlaybackStatus = "stopped";
  let current: LoadedTrack | null = null;
  let generation = 0;
  let queue: Promise<unknown> = Promise.resolve();

  /** Run fn after every previously queued play/stop has settled */
  function serialize<T>(fn: () => Promise<T>): Promise<T> {
    const run = queue.then(fn, fn);
    queue = run.catch(() => undefined);
    return run;
  }

  async function search(query: string, limit: number = defaultLimit): Promise<SongCandidate[]> {
    log("MUSIC_SEARCH", `Searching for: ${query}`);
    try {
      const results = (await catalog.search(query, limit)).slice(0, limit);
      log("MUSIC_SEARCH_RESULT", `Found ${results.length} songs for '${query}'`);
      return results;
    } catch (err) {
      log("MUSIC_ERROR", `Error searching songs: ${errorMessage(err)}`);
      return [];
    }
  }

  async function playSearchResult(query: string, index = 0): Promise<boolean> {
    const results = await search(query, Math.max(5, index + 1));
    if (results.length === 0) {
      log("MUSIC_ERROR", `No songs found for: ${query}`);
      return false;
    }
    const candidate = results[index];
    if (!candidate) {
      log("MUSIC_ERROR", `Search result index ${index} out of range (found ${results.length} songs)`);
      return false;
    }
    return play(candidate);
  }

  function play(candidate: SongCandidate): Promise<boolean> {
    return serialize(async () => {
      await stopCurrent();

      const id = songIdFor(candidate.videoId, candidate.title, candidate.artist);
      log("MUSIC_PLAY", `Starting playback: ${candidate.title} by ${candidate.artist}`);

      try {
        if (await cache.isCached(id)) {
          log("CACHE_HIT", `Playing cached version: ${candidate.title}`);
          await cache.recordPlay(id);
        } else {
          log("CACHE_MISS", `Downloading: ${candidate.title}`);
          await download(id, candidate);
        }
      } catch (err) {
        log("MUSIC_ERROR", `Failed to prepare ${candidate.title}: ${errorMessage(err)}`);
        return false;
      }

      const song: Song = {
        id,
        videoId: candidate.videoId,
        title: candidate.title,
        artist: candidate.artist,
        cachedFilePath: cache.pathFor(id),
        playCount: cache.getEntry(id)?.playCount ?? 1,
        lastPlayedAt: now(),
      };
      return startPlayback(song);
    });
  }

  /** Extract, transcode to a partial file, rename, record. Cleans up on failure. */
  async function download(id: string, candidate: SongCandidate): Promise<void> {
    const partial = cache.partialPathFor(id);
    try {
      const url = await catalog.resolveStreamUrl(candidate.videoId);
      await transcoder.transcode(url, partial);
      if ((await stat(partial)).size === 0) {
        throw new Error("transcoder produced an empty file");
      }
      await rename(partial, cache.pathFor(id));
      await cache.recordDownload(id, candidate);
      log("CACHE_DOWNLOAD", `Cached: ${candidate.title} (${id})`);
    } catch (err) {
      await cache.discard(id);
      throw err;
    }
  }

  function startPlayback(song: Song): boolean {
    const trackGeneration = ++generation;
    let handle: PlaybackHandle;
    try {
      handle = launch(song.cachedFilePath, (code) => onTrackEnd(trackGeneration, code));
    } catch (err) {
      log("MUSIC_ERROR", `Failed to start player: ${errorMessage(err)}`);
      return false;
    }
    current = { song, handle, generation: trackGeneration };
    status = "playing";
    log("MUSIC_PLAYBACK", `Playing: ${song.artist} - ${song.title}`);
    return true;
  }

  function onTrackEnd(trackGeneration: number, code: number | null): void {
    if (!current || current.generation !== trackGeneration) return;
    log("MUSIC_FINISHED", `Finished playing: ${current.song.title}${code ? ` (exit code ${code})` : ""}`);
    current = null;
    status = "stopped";
  }

  /** Unserialized stop, for use inside the queue */
  async function stopCurrent(): Promise<boolean> {
    const track = current;
    if (!track) return false;
    current = null;
    status = "stopped";
    await track.handle.stop();
    log("MUSIC_STOP", `Stopped: ${track.song.title}`);
    return true;
  }

  function stop(): Promise<boolean> {
    return serialize(stopCurrent);
  }

  async function pause(): Promise<boolean> {
    if (status === "paused_for_conversation") {
      // The user now owns this pause; the conversation must not resume it
      status = "paused";
      log("MUSIC_PAUSE", "Conversation pause converted to user pause");
      return false;
    }
    if (status !== "playing" || !current) return false;
    current.handle.pause();
    status = "paused";
    log("MUSIC_PAUSE", `Paused: ${current.song.title}`);
    return true;
  }

  async function resume(): Promise<boolean> {
    if ((status !== "paused" && status !== "paused_for_conversation") || !current) return false;
    current.handle.resume();
    status = "playing";
    log("MUSIC_RESUME", `Resumed: ${current.song.title}`);
    return true;
  }

  async function pauseForConversation(): Promise<boolean> {
    if (status !== "playing" || !current) return false;
    current.handle.pause();
    status = "paused_for_conversation";
    log("MUSIC_CONV_PAUSE", `Paused for conversation: ${current.song.title}`);
    return true;
  }

  async function resumeAfterConversation(): Promise<boolean> {
    if (status !== "paused_for_conversation" || !current) return false;
    current.handle.resume();
    status = "playing";
    log("MUSIC_CONV_RESUME", `Resumed after conversation: ${current.song.title}`);
    return true;
  }

  function getStatus(): MusicStatus {
    return {
      status,
      isPlaying: current !== null,
      isPaused: status === "paused" || status === "paused_for_conversation",
      currentSong: current ? { ...current.song } : null,
    };
  }

  function getCacheInfo(): Promise<CacheInfo> {
    return cache.info();
  }

  async function cleanup(): Promise<void> {
    await stop();
    log("MUSIC_CLEANUP", "Music engine cleaned up");
  }

  return {
    search,
    playSearchResult,
    play,
    pause,
    resume,
    pauseForConversation,
    resumeAfterConversation,
    stop,
    getStatus,
    getCacheInfo,
    cleanup,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
