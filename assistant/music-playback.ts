/**
 * Music playback in a separate ffplay process.
 *
 * The player process is the preemptible worker: pause and resume are
 * SIGSTOP/SIGCONT, stop is SIGCONT+SIGTERM with a SIGKILL fallback. The
 * engine observes the end of a track through the onExit callback.
 */

import { spawn } from "child_process";

import { logStderr } from "./local-audio.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** How long stop() waits for the player to exit before SIGKILL */
export const STOP_TIMEOUT_MS = 2_000;

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Handle to one running track.
 */
export interface PlaybackHandle {
  /** Suspend the player. False once it has exited. */
  pause: () => boolean;
  /** Continue a suspended player. False once it has exited. */
  resume: () => boolean;
  /** Terminate the player and wait for it to go away */
  stop: () => Promise<void>;
}

/** Starts playback of a file; onExit fires exactly once when the player ends */
export type PlaybackLauncher = (filePath: string, onExit: (code: number | null) => void) => PlaybackHandle;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Start ffplay on a file, without a window, exiting at the end of the track.
 *
 * @param filePath - Audio file to play
 * @param onExit - Called once with the exit code (null if killed or failed to start)
 * @returns PlaybackHandle
 */
export function launchFfplay(filePath: string, onExit: (code: number | null) => void): PlaybackHandle {
  const proc = spawn("ffplay", ["-nodisp", "-autoexit", "-loglevel", "error", filePath], {
    stdio: ["ignore", "ignore", "pipe"],
  });
  let exited = false;
  const exitWaiters: Array<() => void> = [];

  function markExited(code: number | null): void {
    if (exited) return;
    exited = true;
    for (const wake of exitWaiters.splice(0)) wake();
    onExit(code);
  }

  logStderr(proc, "ffplay");
  proc.on("error", (err) => {
    console.error(`[ffplay] process error: ${err.message}`);
    markExited(null);
  });
  proc.on("exit", (code) => markExited(code));

  function signal(sig: NodeJS.Signals): boolean {
    if (exited) return false;
    return proc.kill(sig);
  }

  async function stop(): Promise<void> {
    if (exited) return;
    const gone = new Promise<void>((resolve) => exitWaiters.push(resolve));
    // A stopped process ignores SIGTERM until continued
    signal("SIGCONT");
    signal("SIGTERM");

    let timer: NodeJS.Timeout | undefined;
    const timedOut = await Promise.race([
      gone.then(() => false),
      new Promise<boolean>((resolve) => {
        timer = setTimeout(() => resolve(true), STOP_TIMEOUT_MS);
      }),
    ]);
    clearTimeout(timer);

    if (timedOut) {
      console.log("[ffplay] did not exit after SIGTERM, sending SIGKILL");
      signal("SIGKILL");
    }
  }

  return {
    pause: () => signal("SIGSTOP"),
    resume: () => signal("SIGCONT"),
    stop,
  };
}
