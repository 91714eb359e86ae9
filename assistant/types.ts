/**
 * Shared types for the wake-word voice assistant.
 *
 * Defines the DTOs and interfaces used across the assistant modules:
 * - Assistant configuration
 * - Conversation session state
 * - Dialogue transport events (inbound and outbound)
 * - Music catalog, cache and playback state
 * - Music command variants and command results
 */

// ============================================================================
// CONFIGURATION INTERFACES
// ============================================================================

/**
 * Top-level configuration for the assistant.
 * Built by `loadConfig` from the environment over DEFAULT_CONFIG.
 */
export interface AssistantConfig {
  /** Realtime dialogue engine settings */
  dialogue: DialogueConfig;
  /** Wake-word detector settings */
  wakeWord: WakeWordConfig;
  /** Music cache and playback settings */
  music: MusicConfig;
  /** Audio device settings */
  audio: AudioConfig;
  /** Directory holding the acknowledgment/transition WAV files */
  cueDir: string;
  /** Upper bound (ms) for one whole conversation */
  conversationTimeoutMs: number;
  /** Path of the event log file, or null to log to the console only */
  logFile: string | null;
}

/**
 * Configuration for the realtime dialogue session.
 */
export interface DialogueConfig {
  /** API key for the realtime dialogue endpoint */
  apiKey: string;
  /** Realtime model identifier */
  model: string;
  /** Assistant voice */
  voice: string;
  /** Behavioral instructions sent in the session configuration */
  instructions: string;
  /** Greeting sent as a programmatic turn once the session opens (empty = none) */
  greeting: string;
  /** Base silence timeout (ms) before the watchdog ends the conversation */
  silenceTimeoutMs: number;
  /** Extra silence (ms) granted right after the assistant finishes a turn */
  silenceGraceMs: number;
}

/**
 * Configuration for wake-word detection.
 */
export interface WakeWordConfig {
  /** Detector access key */
  accessKey: string;
  /** Keyword file name prefix (e.g. "Hi-Taco" for Hi-Taco_en_linux_v3_0_0.ppn) */
  keywordName: string;
  /** Directory that holds the keyword model files */
  modelDir: string;
  /** Detection sensitivity, 0.0 (strict) to 1.0 (loose) */
  sensitivity: number;
}

/**
 * Configuration for the music subsystem.
 */
export interface MusicConfig {
  /** Directory for cached audio files and the cache index */
  cacheDir: string;
  /** Number of candidates requested from the catalog */
  searchLimit: number;
}

/**
 * Configuration for the local audio device.
 */
export interface AudioConfig {
  /** PulseAudio source for the microphone (null = server default) */
  micDevice: string | null;
  /** PulseAudio sink for the speaker (null = server default) */
  speakerDevice: string | null;
}

// ============================================================================
// LOGGING
// ============================================================================

/** Structured event logger: an event type tag and a message */
export type LogFn = (type: string, message: string) => void;

// ============================================================================
// CONVERSATION SESSION
// ============================================================================

/** Lifecycle states of a dialogue session */
export type SessionState = "init" | "streaming" | "ending" | "closed";

/** Why a session ended */
export type EndReason =
  | "end_phrase"
  | "music_started"
  | "silence_timeout"
  | "transport_closed"
  | "uplink_failed"
  | "stopped";

/**
 * Read-only view of a session's shared fields.
 */
export interface SessionSnapshot {
  state: SessionState;
  /** Epoch ms of the last user or assistant activity */
  lastActivityAt: number;
  /** Whether assistant output is in progress */
  assistantSpeaking: boolean;
  /** Epoch ms of the last completed assistant turn, or null */
  assistantFinishedAt: number | null;
  /** Set once any loop decided the session must end */
  shouldEnd: boolean;
  /** Reason recorded by the loop that ended the session */
  endReason: EndReason | null;
}

// ============================================================================
// DIALOGUE TRANSPORT EVENTS
// ============================================================================

/** Inbound event from the dialogue engine, narrowed to what the session handles */
export type DialogueEvent =
  | { type: "user_transcript"; text: string }
  | { type: "assistant_audio"; pcm: Buffer }
  | { type: "assistant_text"; text: string }
  | { type: "turn_complete" }
  | { type: "speech_started" }
  | { type: "error"; message: string }
  | { type: "ignored"; rawType: string };

/** Outbound client event sent to the dialogue engine */
export type ClientEvent =
  | { type: "session.update"; session: SessionSettings }
  | { type: "input_audio_buffer.append"; audio: string }
  | { type: "conversation.item.create"; item: ConversationItem }
  | { type: "response.create" };

/**
 * Session configuration describing audio formats and behavior.
 */
export interface SessionSettings {
  modalities: Array<"text" | "audio">;
  instructions: string;
  voice: string;
  input_audio_format: "pcm16";
  output_audio_format: "pcm16";
  input_audio_transcription: { model: string };
}

/**
 * A programmatic conversation turn.
 */
export interface ConversationItem {
  type: "message";
  role: "user";
  content: Array<{ type: "input_text"; text: string }>;
}

// ============================================================================
// MUSIC TYPES
// ============================================================================

/**
 * A search hit from the music catalog, in the catalog's ranking order.
 */
export interface SongCandidate {
  videoId: string;
  title: string;
  artist: string;
  /** Track length in seconds, when the catalog reports it */
  durationSeconds: number | null;
}

/**
 * A song that is (or is being) played from the local cache.
 */
export interface Song {
  /** Content hash of (videoId, title, artist) */
  id: string;
  videoId: string;
  title: string;
  artist: string;
  /** Absolute path of the cached audio file */
  cachedFilePath: string;
  playCount: number;
  /** Epoch ms of the last play */
  lastPlayedAt: number;
}

/**
 * Persisted cache index entry, keyed by song id.
 */
export interface CacheEntry {
  videoId: string;
  title: string;
  artist: string;
  /** Local time the song was first cached, "YYYY-MM-DD HH:MM:SS" */
  cachedAt: string;
  /** Epoch seconds the song was first cached */
  cachedTimestamp: number;
  playCount: number;
  /** Local time of the last play, "YYYY-MM-DD HH:MM:SS" */
  lastPlayed: string;
}

/** Playback state machine states */
export type PlaybackStatus = "stopped" | "playing" | "paused" | "paused_for_conversation";

/**
 * Snapshot of the music engine, safe to read from any loop.
 */
export interface MusicStatus {
  status: PlaybackStatus;
  /** True while a track is loaded (playing or paused) */
  isPlaying: boolean;
  /** True while the loaded track is paused (by the user or for a conversation) */
  isPaused: boolean;
  currentSong: Song | null;
}

/**
 * Summary of the music cache contents.
 */
export interface CacheInfo {
  totalSongs: number;
  totalSizeMb: number;
  cacheDir: string;
  /** Up to five most played entries, highest play count first */
  mostPlayed: Array<{ id: string; entry: CacheEntry }>;
}

// ============================================================================
// MUSIC COMMANDS
// ============================================================================

/** A recognized music intent */
export type MusicCommand =
  | { kind: "play"; query: string }
  | { kind: "pause" }
  | { kind: "resume" }
  | { kind: "stop" }
  | { kind: "skip" }
  | { kind: "status" };

/** Machine-readable outcome tag of a music command */
export type MusicAction =
  | "play"
  | "play_failed"
  | "pause"
  | "pause_no_music"
  | "pause_already_paused"
  | "resume"
  | "resume_no_music"
  | "resume_not_paused"
  | "stop"
  | "stop_no_music"
  | "status"
  | "skip"
  | "skip_no_music"
  | "error";

/**
 * Result of a music command: a short spoken-style message plus an action tag.
 */
export interface CommandResult {
  success: boolean;
  response: string;
  action: MusicAction;
}
