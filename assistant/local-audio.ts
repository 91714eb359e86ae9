/**
 * Local audio backend via PulseAudio/PipeWire CLI tools.
 *
 * Uses child processes for all device I/O: `parec` for mic capture, `pacat`
 * for speaker playback and `paplay` for one-shot sound files. When the
 * echo-cancel virtual devices are configured, assistant speech is subtracted
 * from the mic signal, which keeps barge-in from triggering on our own voice.
 *
 * Responsibilities:
 * - Verify the required CLI tools exist at startup
 * - Open parec as a FrameSource of fixed-size PCM16 frames
 * - Open pacat as a SpeakerSink with backpressure handling
 * - Play cue files with paplay and report failures
 * - Log tool stderr output for diagnostics
 */

import { spawn, exec, type ChildProcess } from "child_process";

import { createFrameReader, BYTES_PER_SAMPLE } from "./frame-reader.js";

import type { Writable } from "stream";
import type { AudioBackend, FrameSource, InputOptions, SpeakerSink } from "./audio-adapter.js";
import type { AudioConfig } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Tools the backend shells out to */
const REQUIRED_COMMANDS = ["parec", "pacat", "paplay"];

/** Instructions shown when the PulseAudio tools are missing */
const INSTALL_INSTRUCTIONS = "Install with: sudo apt install pulseaudio-utils";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Create the local PulseAudio-backed AudioBackend.
 *
 * @param config - Optional source/sink names (null = PulseAudio defaults)
 * @returns An AudioBackend for the local device
 * @throws Error if parec, pacat or paplay is missing
 */
export async function createLocalAudioBackend(config: AudioConfig): Promise<AudioBackend> {
  for (const cmd of REQUIRED_COMMANDS) {
    if (!(await commandExists(cmd))) {
      throw new Error(`${cmd} not found. ${INSTALL_INSTRUCTIONS}`);
    }
  }

  /**
   * Spawn parec and frame its stdout.
   *
   * @param options - Sample rate and frame length
   * @returns FrameSource that kills parec on close
   */
  function openInput(options: InputOptions): FrameSource {
    const args = [
      "--format=s16le",
      `--rate=${options.sampleRate}`,
      "--channels=1",
      "--raw",
    ];
    if (config.micDevice) args.unshift(`--device=${config.micDevice}`);

    const parec = spawn("parec", args);
    if (!parec.stdout) {
      parec.kill();
      throw new Error("Failed to get parec stdout stream");
    }

    logStderr(parec, "parec");
    parec.on("error", (err) => {
      console.error(`[parec] process error: ${err.message}`);
    });

    return createFrameReader(parec.stdout, options.frameSamples * BYTES_PER_SAMPLE, () => {
      parec.kill();
    });
  }

  /**
   * Spawn pacat for raw PCM playback.
   *
   * @param sampleRate - Output sample rate in Hz
   * @returns SpeakerSink writing to pacat stdin
   */
  function openOutput(sampleRate: number): SpeakerSink {
    const args = [
      "--format=s16le",
      `--rate=${sampleRate}`,
      "--channels=1",
      "--raw",
      "--playback",
    ];
    if (config.speakerDevice) args.unshift(`--device=${config.speakerDevice}`);

    const pacat = spawn("pacat", args);
    const stdin = pacat.stdin;
    if (!stdin) {
      pacat.kill();
      throw new Error("Failed to get pacat stdin stream");
    }

    let closed = false;
    logStderr(pacat, "pacat");
    pacat.on("error", (err) => {
      console.error(`[pacat] process error: ${err.message}`);
    });
    // Writes racing a kill surface as EPIPE; the sink is already closed by then
    stdin.on("error", (err: Error) => {
      if (!closed) console.error(`[pacat] stdin error: ${err.message}`);
    });

    function write(pcm: Buffer): Promise<void> {
      if (closed) return Promise.resolve();
      return writePcm(stdin, pcm);
    }

    function close(): void {
      if (closed) return;
      closed = true;
      stdin.end();
      pacat.kill();
    }

    return { write, close };
  }

  /**
   * Play a sound file with paplay and wait for it to finish.
   *
   * @param path - WAV file to play
   */
  function playFile(path: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const args = config.speakerDevice ? [`--device=${config.speakerDevice}`, path] : [path];
      const player = spawn("paplay", args);
      player.on("error", (err) => reject(new Error(`paplay failed to start: ${err.message}`)));
      player.on("exit", (code) => {
        if (code === 0) resolve();
        else reject(new Error(`paplay exited with code ${code}`));
      });
    });
  }

  return { openInput, openOutput, playFile };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Write PCM to a stream, resolving once the stream can take more data.
 *
 * @param stream - Destination stream
 * @param pcm - PCM bytes
 */
function writePcm(stream: Writable, pcm: Buffer): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    const ok = stream.write(pcm, (err: Error | null | undefined) => {
      if (err) reject(err);
    });
    if (ok) {
      resolve();
      return;
    }
    // A killed pacat never drains; closing the sink must release the writer
    const done = (): void => {
      stream.off("drain", done);
      stream.off("close", done);
      resolve();
    };
    stream.once("drain", done);
    stream.once("close", done);
  });
}

/**
 * Check whether a command exists on the system PATH.
 *
 * @param cmd - The command name to check
 * @returns true if the command exists, false otherwise
 */
export function commandExists(cmd: string): Promise<boolean> {
  return new Promise((resolve) => {
    exec(`command -v ${cmd}`, (error) => {
      resolve(error === null);
    });
  });
}

/**
 * Forward a child process's stderr lines to the console with a tag.
 *
 * @param proc - Child process
 * @param tag - Prefix for each line
 */
export function logStderr(proc: ChildProcess, tag: string): void {
  if (!proc.stderr) return;
  proc.stderr.on("data", (data: Buffer) => {
    for (const line of data.toString().split("\n")) {
      const trimmed = line.trim();
      if (trimmed) console.log(`[${tag}] ${trimmed}`);
    }
  });
}
