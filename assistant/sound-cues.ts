/**
 * Short sound cues around a conversation.
 *
 * The acknowledgment cue plays right after the wake word, the transition cue
 * after the conversation ends. A missing or unplayable cue file is logged and
 * skipped; it never blocks the conversation.
 */

import { existsSync } from "fs";
import { join } from "path";

import type { AudioBackend } from "./audio-adapter.js";
import type { LogFn } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const ACKNOWLEDGMENT_FILE = "hi_there.wav";
export const TRANSITION_FILE = "bye_bye.wav";

/** Pause after a cue before the device is handed on */
export const CUE_SETTLE_MS = 300;

// ============================================================================
// INTERFACES
// ============================================================================

export interface SoundCues {
  /** Play the wake-word acknowledgment */
  acknowledge: () => Promise<void>;
  /** Play the end-of-conversation cue */
  transition: () => Promise<void>;
}

export interface SoundCueDeps {
  backend: Pick<AudioBackend, "playFile">;
  cueDir: string;
  log: LogFn;
  /** Sleep, injectable for tests */
  delay?: (ms: number) => Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the sound cue player.
 *
 * @param deps - Audio backend, cue directory and logger
 * @returns SoundCues
 */
export function createSoundCues(deps: SoundCueDeps): SoundCues {
  const { backend, cueDir, log } = deps;
  const delay = deps.delay ?? ((ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms)));

  async function playCue(filename: string, errorType: string): Promise<void> {
    const path = join(cueDir, filename);
    if (!existsSync(path)) {
      log(errorType, `Audio file not found: ${path}`);
      return;
    }
    try {
      await backend.playFile(path);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log(errorType, `Failed to play ${filename}: ${message}`);
      return;
    }
    await delay(CUE_SETTLE_MS);
  }

  return {
    acknowledge: () => playCue(ACKNOWLEDGMENT_FILE, "WAKE_WORD_ACK_ERROR"),
    transition: () => playCue(TRANSITION_FILE, "BYE_BYE_ERROR"),
  };
}
