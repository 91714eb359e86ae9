/**
 * Assistant configuration from environment variables.
 *
 * run.ts loads .env into process.env (dotenv) and passes the environment here.
 * Every setting has a default except the two credentials, which abort startup
 * when missing.
 *
 * Responsibilities:
 * - Define DEFAULT_CONFIG
 * - Overlay environment values, falling back to defaults for invalid numbers
 * - Resolve relative paths against the working directory
 * - Reject a configuration without the dialogue or wake-word credentials
 */

import { resolve } from "path";

import type { AssistantConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Behavioral instructions for the dialogue engine */
const DEFAULT_INSTRUCTIONS =
  "You are a helpful voice assistant with full music capabilities. A built-in music player can play " +
  "songs on request. When users ask about music, mention commands like 'play [song name]', 'pause', " +
  "'resume', 'stop the music' and 'skip'. Never say you cannot play music: the music system handles " +
  "those commands automatically, so just acknowledge the request. Keep answers short and conversational.";

/** Default configuration, credentials left empty */
export const DEFAULT_CONFIG: AssistantConfig = {
  dialogue: {
    apiKey: "",
    model: "gpt-4o-realtime-preview-2024-10-01",
    voice: "alloy",
    instructions: DEFAULT_INSTRUCTIONS,
    greeting: "Hello! I heard you call me. How can I help you?",
    silenceTimeoutMs: 5_000,
    silenceGraceMs: 4_000,
  },
  wakeWord: {
    accessKey: "",
    keywordName: "Hi-Taco",
    modelDir: ".",
    sensitivity: 0.6,
  },
  music: {
    cacheDir: "music_cache",
    searchLimit: 5,
  },
  audio: {
    micDevice: null,
    speakerDevice: null,
  },
  cueDir: "audio",
  conversationTimeoutMs: 30_000,
  logFile: "logs/assistant.log",
};

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Build the assistant configuration from an environment record.
 *
 * @param env - Environment variables (usually process.env after dotenv)
 * @returns The resolved configuration
 * @throws Error if OPENAI_API_KEY or PORCUPINE_ACCESS_KEY is missing
 */
export function loadConfig(env: Record<string, string | undefined>): AssistantConfig {
  const missing = ["OPENAI_API_KEY", "PORCUPINE_ACCESS_KEY"].filter((key) => !env[key]?.trim());
  if (missing.length > 0) {
    throw new Error(
      `Missing required setting(s): ${missing.join(", ")}. ` +
      "Set them in .env or the environment (see .env.example)."
    );
  }

  const defaults = DEFAULT_CONFIG;
  const logFile = env.LOG_FILE ?? defaults.logFile;

  return {
    dialogue: {
      apiKey: (env.OPENAI_API_KEY ?? "").trim(),
      model: env.REALTIME_MODEL || defaults.dialogue.model,
      voice: env.REALTIME_VOICE || defaults.dialogue.voice,
      instructions: env.REALTIME_INSTRUCTIONS || defaults.dialogue.instructions,
      greeting: env.REALTIME_GREETING ?? defaults.dialogue.greeting,
      silenceTimeoutMs: parsePositiveInt(env.SILENCE_TIMEOUT_MS, defaults.dialogue.silenceTimeoutMs),
      silenceGraceMs: parsePositiveInt(env.SILENCE_GRACE_MS, defaults.dialogue.silenceGraceMs),
    },
    wakeWord: {
      accessKey: (env.PORCUPINE_ACCESS_KEY ?? "").trim(),
      keywordName: env.WAKE_WORD_NAME || defaults.wakeWord.keywordName,
      modelDir: resolve(env.WAKE_WORD_MODEL_DIR || defaults.wakeWord.modelDir),
      sensitivity: parseSensitivity(env.WAKE_WORD_SENSITIVITY, defaults.wakeWord.sensitivity),
    },
    music: {
      cacheDir: resolve(env.MUSIC_CACHE_DIR || defaults.music.cacheDir),
      searchLimit: parsePositiveInt(env.MUSIC_SEARCH_LIMIT, defaults.music.searchLimit),
    },
    audio: {
      micDevice: env.MIC_DEVICE || null,
      speakerDevice: env.SPEAKER_DEVICE || null,
    },
    cueDir: resolve(env.AUDIO_CUE_DIR || defaults.cueDir),
    conversationTimeoutMs: parsePositiveInt(env.CONVERSATION_TIMEOUT_MS, defaults.conversationTimeoutMs),
    logFile: logFile ? resolve(logFile) : null,
  };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Parse a positive integer, falling back on anything else.
 *
 * @param value - Raw env value
 * @param fallback - Default
 * @returns The parsed value or the fallback
 */
function parsePositiveInt(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value ?? "", 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Parse a detector sensitivity in [0, 1].
 *
 * @param value - Raw env value
 * @param fallback - Default
 * @returns The parsed value or the fallback
 */
function parseSensitivity(value: string | undefined, fallback: number): number {
  const parsed = parseFloat(value ?? "");
  return Number.isFinite(parsed) && parsed >= 0 && parsed <= 1 ? parsed : fallback;
}
