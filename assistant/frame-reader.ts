/**
 * Fixed-size PCM framing over a Node.js readable stream.
 *
 * Capture tools deliver PCM in arbitrary chunk sizes. The wake-word detector
 * and the dialogue uplink both want exactly one frame at a time, so this module
 * re-slices the byte stream into frames and exposes them through a pull-based
 * FrameSource.
 *
 * Responsibilities:
 * - Re-slice a byte stream into fixed-size frames
 * - Resolve readFrame() with null once the stream ends or the source is closed
 * - Bound the backlog when the consumer falls behind (oldest frames are dropped)
 * - PCM helpers: int16 view of a frame and RMS level
 */

import type { Readable } from "stream";
import type { FrameSource } from "./audio-adapter.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Number of bytes per 16-bit sample */
export const BYTES_PER_SAMPLE = 2;

/** Maximum frames kept while nobody is reading */
const MAX_BACKLOG_FRAMES = 64;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Wrap a readable PCM stream as a FrameSource.
 *
 * @param stream - Raw 16-bit signed PCM stream (e.g. parec stdout)
 * @param frameBytes - Size of one frame in bytes
 * @param onClose - Called once when the source is closed (e.g. kill the capture process)
 * @returns A FrameSource yielding frames of exactly frameBytes
 */
export function createFrameReader(stream: Readable, frameBytes: number, onClose?: () => void): FrameSource {
  if (frameBytes <= 0 || frameBytes % BYTES_PER_SAMPLE !== 0) {
    throw new Error(`Frame size must be a positive multiple of ${BYTES_PER_SAMPLE} bytes, got ${frameBytes}`);
  }

  let pending: Buffer = Buffer.alloc(0);
  let ended = false;
  let closed = false;
  let waiter: ((frame: Buffer | null) => void) | null = null;

  /** Hand a frame (or end-of-stream) to a waiting reader, if any */
  function deliver(): void {
    if (!waiter) return;

    if (pending.length >= frameBytes) {
      const frame = takeFrame();
      const resolve = waiter;
      waiter = null;
      resolve(frame);
      return;
    }

    if (ended) {
      const resolve = waiter;
      waiter = null;
      resolve(null);
    }
  }

  /** Remove one frame from the front of the pending buffer */
  function takeFrame(): Buffer {
    const frame = Buffer.from(pending.subarray(0, frameBytes));
    pending = pending.subarray(frameBytes);
    return frame;
  }

  function onData(chunk: Buffer): void {
    pending = pending.length === 0 ? Buffer.from(chunk) : Buffer.concat([pending, chunk]);

    const maxBytes = MAX_BACKLOG_FRAMES * frameBytes;
    if (pending.length > maxBytes) {
      // Drop whole frames from the front so frame alignment is preserved
      const excessFrames = Math.ceil((pending.length - maxBytes) / frameBytes);
      pending = pending.subarray(excessFrames * frameBytes);
    }

    deliver();
  }

  function onEnd(): void {
    ended = true;
    deliver();
  }

  stream.on("data", onData);
  stream.on("end", onEnd);
  stream.on("close", onEnd);
  stream.on("error", (err: Error) => {
    console.error(`[audio] mic stream error: ${err.message}`);
    onEnd();
  });

  function readFrame(): Promise<Buffer | null> {
    if (closed) return Promise.resolve(null);
    if (pending.length >= frameBytes) return Promise.resolve(takeFrame());
    if (ended) return Promise.resolve(null);
    if (waiter) {
      return Promise.reject(new Error("readFrame() called while another read is pending"));
    }
    return new Promise<Buffer | null>((resolve) => {
      waiter = resolve;
    });
  }

  function close(): void {
    if (closed) return;
    closed = true;
    ended = true;
    pending = Buffer.alloc(0);
    stream.off("data", onData);
    deliver();
    onClose?.();
  }

  return { readFrame, close };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * View a 16-bit signed little-endian PCM buffer as samples.
 *
 * @param frame - Raw PCM bytes (even length)
 * @returns Int16Array copy of the samples
 */
export function toInt16Samples(frame: Buffer): Int16Array {
  const sampleCount = Math.floor(frame.length / BYTES_PER_SAMPLE);
  const samples = new Int16Array(sampleCount);
  for (let i = 0; i < sampleCount; i++) {
    samples[i] = frame.readInt16LE(i * BYTES_PER_SAMPLE);
  }
  return samples;
}

/**
 * Root-mean-square level of a PCM16 frame on the int16 scale (0..32768).
 *
 * @param frame - Raw 16-bit signed PCM bytes
 * @returns RMS level, 0 for an empty frame
 */
export function computeRms(frame: Buffer): number {
  const samples = toInt16Samples(frame);
  if (samples.length === 0) return 0;

  let sumSquares = 0;
  for (const sample of samples) {
    sumSquares += sample * sample;
  }
  return Math.sqrt(sumSquares / samples.length);
}
