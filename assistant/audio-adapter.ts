/**
 * Audio I/O interfaces shared by the wake-word listener, the dialogue session
 * and the sound cues.
 *
 * Any audio backend (PulseAudio CLI tools locally, fakes in tests) implements
 * AudioBackend so the session logic remains transport-agnostic.
 *
 * Responsibilities:
 * - Define a pull-based source of fixed-size PCM16 mic frames
 * - Define a speaker sink with backpressure
 * - Define one-shot playback of a sound file
 */

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Pull-based microphone stream of fixed-size 16-bit signed mono PCM frames.
 */
export interface FrameSource {
  /**
   * Wait for the next complete frame.
   * @returns The frame, or null once the source is closed or the stream ended
   */
  readFrame: () => Promise<Buffer | null>;

  /**
   * Stop capturing. Pending and future readFrame() calls resolve to null.
   */
  close: () => void;
}

/**
 * Speaker output for 16-bit signed mono PCM.
 */
export interface SpeakerSink {
  /**
   * Queue PCM for playback.
   * @returns Resolves when the sink accepted the data (backpressure)
   */
  write: (pcm: Buffer) => Promise<void>;

  /**
   * Stop playback and free the output.
   */
  close: () => void;
}

/**
 * Options for opening a mic frame source.
 */
export interface InputOptions {
  /** Sample rate in Hz */
  sampleRate: number;
  /** Samples per frame */
  frameSamples: number;
}

/**
 * Factory for audio streams on the local device.
 */
export interface AudioBackend {
  /**
   * Open the microphone.
   * @throws Error if the capture tool cannot be started
   */
  openInput: (options: InputOptions) => FrameSource;

  /**
   * Open the speaker at the given sample rate.
   * @throws Error if the playback tool cannot be started
   */
  openOutput: (sampleRate: number) => SpeakerSink;

  /**
   * Play a sound file to completion.
   * @returns Resolves when playback ends; rejects if the player fails
   */
  playFile: (path: string) => Promise<void>;
}
