/**
 * Wake-word listening.
 *
 * The detector is Picovoice Porcupine with a custom keyword model (.ppn). The
 * listener owns the audio device while it listens and hands it back as soon as
 * a keyword is heard, so the dialogue session can take it.
 *
 * Responsibilities:
 * - Pick the keyword model file for this platform (Raspberry Pi file as fallback)
 * - Construct the detector, failing startup with a diagnostic on any problem
 * - Acquire the device and open the mic at the detector's rate and frame length
 * - Feed frames to the detector and report detections
 * - Release mic, device and detector on stop/destroy
 */

import { existsSync, readdirSync } from "fs";
import { join } from "path";

import { toInt16Samples } from "./frame-reader.js";

import type { AudioBackend, FrameSource } from "./audio-adapter.js";
import type { AudioDevice, DeviceLease } from "./audio-device.js";
import type { LogFn, WakeWordConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Keyword model file version suffix */
const MODEL_VERSION = "v3_0_0";

/** Platform whose model file is tried when the native one is missing */
const FALLBACK_PLATFORM = "raspberry-pi";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * A wake-word detector that consumes fixed-size int16 frames.
 */
export interface WakeWordDetector {
  sampleRate: number;
  frameLength: number;
  /** Display names, indexed by the detector's result */
  keywords: string[];
  /** Returns the index of the detected keyword, or -1 */
  process: (frame: Int16Array) => number;
  release: () => void;
}

/**
 * Wake-word listener lifecycle.
 */
export interface WakeWordListener {
  /** Acquire the device and open the mic. Idempotent. */
  start: () => void;
  /** Read and check one frame. Returns the keyword on a match (and stops listening), else null. */
  poll: () => Promise<string | null>;
  /** Close the mic and release the device. Idempotent. */
  stop: () => void;
  /** Stop and release the detector */
  destroy: () => void;
  isListening: () => boolean;
}

/**
 * Collaborators of the listener.
 */
export interface WakeWordListenerDeps {
  detector: WakeWordDetector;
  backend: AudioBackend;
  device: AudioDevice;
  log: LogFn;
}

// ============================================================================
// DETECTOR
// ============================================================================

/**
 * Model file platform tag for the running system.
 *
 * @param platform - Node platform name
 * @param arch - Node CPU architecture
 */
export function platformSuffix(platform: string = process.platform, arch: string = process.arch): string {
  if (platform === "darwin") return "mac";
  if (platform === "linux") return arch.startsWith("arm") ? "raspberry-pi" : "linux-x86_64";
  if (platform === "win32") return "windows-amd64";
  return FALLBACK_PLATFORM;
}

/**
 * Find the keyword model file: the platform-specific one first, then the
 * Raspberry Pi one.
 *
 * @param config - Wake-word settings (keyword name and model directory)
 * @param suffix - Platform tag
 * @returns Absolute path of the model file
 * @throws Error listing the tried and available files when none exists
 */
export function resolveKeywordPath(config: WakeWordConfig, suffix: string = platformSuffix()): string {
  const candidates = [...new Set([
    `${config.keywordName}_en_${suffix}_${MODEL_VERSION}.ppn`,
    `${config.keywordName}_en_${FALLBACK_PLATFORM}_${MODEL_VERSION}.ppn`,
  ])];

  for (const filename of candidates) {
    const path = join(config.modelDir, filename);
    if (existsSync(path)) return path;
  }

  const available = existsSync(config.modelDir)
    ? readdirSync(config.modelDir).filter((f) => f.startsWith(config.keywordName) && f.endsWith(".ppn"))
    : [];
  throw new Error(
    `${config.keywordName} keyword file not found for platform ${suffix} in ${config.modelDir}. ` +
    `Tried: ${candidates.join(", ")}. ` +
    `Available: ${available.length > 0 ? available.join(", ") : "none"}.`
  );
}

/**
 * Create the Porcupine detector. The native module is loaded on first use.
 *
 * @param config - Access key, keyword, model directory and sensitivity
 * @returns A WakeWordDetector
 * @throws Error if the access key or keyword file is missing, or Porcupine fails to start
 */
export async function createPorcupineDetector(config: WakeWordConfig): Promise<WakeWordDetector> {
  if (!config.accessKey) {
    throw new Error(
      "Porcupine access key is required for wake-word detection. " +
      "Get a free key from https://console.picovoice.ai/ and set PORCUPINE_ACCESS_KEY."
    );
  }
  const keywordPath = resolveKeywordPath(config);

  try {
    const { Porcupine } = await import("@picovoice/porcupine-node");
    const porcupine = new Porcupine(config.accessKey, [keywordPath], [config.sensitivity]);
    console.log(
      `[wake-word] Porcupine ready: ${keywordPath} ` +
      `(sample rate ${porcupine.sampleRate}, frame length ${porcupine.frameLength})`
    );
    return {
      sampleRate: porcupine.sampleRate,
      frameLength: porcupine.frameLength,
      keywords: [config.keywordName.replace(/[-_]+/g, " ")],
      process: (frame) => porcupine.process(frame),
      release: () => porcupine.release(),
    };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Porcupine initialization failed: ${message}`);
  }
}

// ============================================================================
// LISTENER
// ============================================================================

/**
 * Create a wake-word listener.
 *
 * @param deps - Detector, audio backend, device and logger
 * @returns A WakeWordListener (not yet listening)
 */
export function createWakeWordListener(deps: WakeWordListenerDeps): WakeWordListener {
  const { detector, backend, device, log } = deps;
  let lease: DeviceLease | null = null;
  let source: FrameSource | null = null;
  let destroyed = false;

  function start(): void {
    if (source) return;
    if (destroyed) throw new Error("Wake-word listener has been destroyed");

    const held = device.acquire("wake-word");
    try {
      source = backend.openInput({ sampleRate: detector.sampleRate, frameSamples: detector.frameLength });
    } catch (err) {
      held.release();
      throw err;
    }
    lease = held;
    log("WAKE_WORD_START", `Listening for wake word: ${detector.keywords.join(", ")}`);
  }

  async function poll(): Promise<string | null> {
    start();
    const mic = source;
    if (!mic) return null;

    const frame = await mic.readFrame();
    if (source !== mic) return null;
    if (frame === null) {
      log("AUDIO_ERROR", "Wake-word microphone stream ended");
      stop();
      return null;
    }

    let index: number;
    try {
      index = detector.process(toInt16Samples(frame));
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log("WAKE_WORD_ERROR", `Porcupine detection failed: ${message}`);
      return null;
    }
    if (index < 0) return null;

    const keyword = detector.keywords[index] ?? `keyword #${index}`;
    log("WAKE_WORD_DETECTED", `Porcupine detected: '${keyword}'`);
    stop();
    return keyword;
  }

  function stop(): void {
    if (!source) return;
    const mic = source;
    source = null;
    mic.close();
    lease?.release();
    lease = null;
    log("WAKE_WORD_STOP", "Stopped wake word detection");
  }

  function destroy(): void {
    stop();
    if (destroyed) return;
    destroyed = true;
    detector.release();
  }

  return { start, poll, stop, destroy, isListening: () => source !== null };
}
