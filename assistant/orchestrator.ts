/**
 * Top-level assistant loop.
 *
 * Alternates between wake-word listening and one dialogue session at a time:
 * listen -> acknowledgment cue -> conversation (bounded by the conversation
 * timeout) -> transition cue -> listen again. The wake-word listener and the
 * session never hold the audio device at the same time.
 */

import type { DialogueSession } from "./dialogue-session.js";
import type { MusicEngine } from "./music-engine.js";
import type { SoundCues } from "./sound-cues.js";
import type { LogFn } from "./types.js";
import type { WakeWordListener } from "./wake-word.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Wait before reopening the mic after the wake-word stream stopped */
const DEFAULT_RESTART_DELAY_MS = 1_000;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Collaborators of the orchestrator.
 */
export interface OrchestratorDeps {
  listener: WakeWordListener;
  cues: SoundCues;
  music: Pick<MusicEngine, "getStatus" | "cleanup">;
  /** Build a fresh session for each conversation */
  createSession: () => DialogueSession;
  log: LogFn;
  /** Upper bound for one conversation */
  conversationTimeoutMs: number;
  restartDelayMs?: number;
  delay?: (ms: number) => Promise<void>;
}

/**
 * Handle to the assistant loop.
 */
export interface Orchestrator {
  /** Run until shutdown(), then clean up */
  run: () => Promise<void>;
  /** Stop the loop, the active session and the listener */
  shutdown: () => Promise<void>;
  /** Destroy the listener and clean up music. Idempotent. */
  cleanup: () => Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the orchestrator.
 *
 * @param deps - Listener, cues, music engine, session factory and logger
 * @returns An Orchestrator
 */
export function createOrchestrator(deps: OrchestratorDeps): Orchestrator {
  const { listener, cues, music, log } = deps;
  const restartDelayMs = deps.restartDelayMs ?? DEFAULT_RESTART_DELAY_MS;
  const delay = deps.delay ?? sleep;

  let running = false;
  let activeSession: DialogueSession | null = null;
  let cleanupPromise: Promise<void> | null = null;

  async function run(): Promise<void> {
    running = true;
    log("SYSTEM", "Assistant started, say the wake word to start a conversation");
    try {
      while (running) {
        const keyword = await waitForWakeWord();
        if (keyword === null || !running) break;
        await converse(keyword);
      }
    } catch (err) {
      log("SYSTEM_ERROR", `Assistant loop failed: ${errorMessage(err)}`);
      throw err;
    } finally {
      running = false;
      await cleanup();
    }
  }

  /** Poll the listener until a keyword is heard; null once shut down */
  async function waitForWakeWord(): Promise<string | null> {
    while (running) {
      let keyword: string | null;
      try {
        keyword = await listener.poll();
      } catch (err) {
        log("WAKE_WORD_ERROR", `Wake-word listening failed: ${errorMessage(err)}`);
        listener.stop();
        await delay(restartDelayMs);
        continue;
      }
      if (keyword !== null) return keyword;
      if (running && !listener.isListening()) await delay(restartDelayMs);
    }
    return null;
  }

  /** One conversation from acknowledgment to transition cue */
  async function converse(keyword: string): Promise<void> {
    listener.stop();
    log("CONVERSATION_START", `Wake word '${keyword}' detected, starting conversation`);
    await cues.acknowledge();
    if (!running) return;

    const session = deps.createSession();
    activeSession = session;
    const finished = session.start().then(
      () => "finished" as const,
      (err: unknown) => {
        log("CONVERSATION_ERROR", `Failed to start conversation: ${errorMessage(err)}`);
        return "finished" as const;
      }
    );
    const timeout = timeoutAfter(deps.conversationTimeoutMs);

    try {
      const outcome = await Promise.race([finished, timeout.promise]);
      if (outcome === "timeout") {
        log(
          "CONVERSATION_TIMEOUT",
          `Conversation exceeded ${Math.round(deps.conversationTimeoutMs / 1000)}s, returning to wake word detection`
        );
        await session.stop();
        await finished;
      }
    } finally {
      timeout.cancel();
      activeSession = null;
    }

    if (!running) return;
    const status = music.getStatus();
    if (status.isPlaying && !status.isPaused) {
      log("BYE_BYE_SKIP", "Skipped transition cue due to active music playback");
    } else {
      await cues.transition();
    }
    log("SYSTEM", "Ready for next wake word");
  }

  async function shutdown(): Promise<void> {
    if (!running) return;
    running = false;
    log("SYSTEM", "Shutdown requested");
    listener.stop();
    if (activeSession) await activeSession.stop();
  }

  function cleanup(): Promise<void> {
    if (!cleanupPromise) cleanupPromise = runCleanup();
    return cleanupPromise;
  }

  async function runCleanup(): Promise<void> {
    try {
      listener.destroy();
    } catch (err) {
      log("SYSTEM_ERROR", `Failed to release wake-word listener: ${errorMessage(err)}`);
    }
    await music.cleanup();
    log("SYSTEM", "Assistant stopped");
  }

  return { run, shutdown, cleanup };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function sleep(ms: number): Promise<void> {
  return new Promise<void>((resolve) => setTimeout(resolve, ms));
}

/**
 * A promise that resolves to "timeout" after `ms`, unless cancelled first.
 */
function timeoutAfter(ms: number): { promise: Promise<"timeout">; cancel: () => void } {
  let cancel: () => void = () => {};
  const promise = new Promise<"timeout">((resolve) => {
    const timer = setTimeout(() => resolve("timeout"), ms);
    cancel = () => clearTimeout(timer);
  });
  return { promise, cancel };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
