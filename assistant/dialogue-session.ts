/**
 * One live conversation with the realtime dialogue engine.
 *
 * State machine: init -> streaming -> ending -> closed. While streaming, three
 * loops run concurrently on the event loop:
 * - uplink: mic frames -> input_audio_buffer.append (the mic is never muted,
 *   so the user can talk over the assistant)
 * - downlink: server events -> speaker, transcripts, music commands, barge-in
 * - watchdog: ends the session after silence, with a grace period after each
 *   completed assistant turn
 *
 * Any loop can end the session for a reason. stop() is idempotent and
 * releases everything in order: mic, speaker, transport, audio device, then
 * resumes music that this session auto-paused (at most once).
 */

import { computeRms } from "./frame-reader.js";
import { matchEndPhrase, parseMusicCommand, type MusicCommandHandler } from "./music-commands.js";
import { realtimeUrl, type DialogueTransport, type TransportFactory } from "./realtime-transport.js";
import { isSilenceExpired } from "./silence-watchdog.js";

import type { AudioBackend, FrameSource, SpeakerSink } from "./audio-adapter.js";
import type { AudioDevice, DeviceLease } from "./audio-device.js";
import type { MusicEngine } from "./music-engine.js";
import type {
  ClientEvent,
  DialogueConfig,
  DialogueEvent,
  EndReason,
  LogFn,
  SessionSnapshot,
  SessionState,
} from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

/** Dialogue audio format: 24 kHz PCM16 mono */
export const DIALOGUE_SAMPLE_RATE = 24_000;

/** Samples per uplink frame */
export const DIALOGUE_FRAME_SAMPLES = 1024;

/** Frame RMS (int16 scale) above which the mic counts as activity */
export const SPEECH_RMS_THRESHOLD = 100;

/** Watchdog check interval */
const DEFAULT_TICK_MS = 1_000;

/** Input transcription model requested in the session configuration */
const TRANSCRIPTION_MODEL = "whisper-1";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Collaborators of a dialogue session.
 */
export interface DialogueSessionDeps {
  config: DialogueConfig;
  transportFactory: TransportFactory;
  backend: AudioBackend;
  device: AudioDevice;
  music: Pick<MusicEngine, "getStatus" | "pauseForConversation" | "resumeAfterConversation">;
  commands: MusicCommandHandler;
  log: LogFn;
  /** Endpoint URL; defaults to the realtime endpoint for config.model */
  url?: string;
  /** Clock in epoch ms */
  now?: () => number;
  /** Watchdog interval in ms */
  tickMs?: number;
}

/**
 * Handle to a dialogue session.
 */
export interface DialogueSession {
  /**
   * Open the conversation and run it to the end. Resolves after all loops
   * have exited and stop() has completed.
   * @throws Error if the session could not be opened (after cleaning up)
   */
  start: () => Promise<void>;
  /**
   * Tear the session down and wait for its loops to exit. Idempotent;
   * concurrent callers share one teardown.
   */
  stop: () => Promise<void>;
  /** Mark the session as ending for the given reason and stop it like stop() */
  requestEnd: (reason: EndReason) => Promise<void>;
  /** Send a programmatic user turn and ask for a response */
  sendText: (text: string) => Promise<void>;
  getSnapshot: () => SessionSnapshot;
}

/** Thrown inside startup when stop() was requested mid-way */
class StartupAbortedError extends Error {
  constructor() {
    super("Session stopped during startup");
  }
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create a dialogue session in the init state.
 *
 * @param deps - Config, transport factory, audio, device, music and logger
 * @returns A DialogueSession
 */
export function createDialogueSession(deps: DialogueSessionDeps): DialogueSession {
  const { config, backend, device, music, commands, log } = deps;
  const now = deps.now ?? Date.now;
  const tickMs = deps.tickMs ?? DEFAULT_TICK_MS;
  const url = deps.url ?? realtimeUrl(config.model);

  // Shared session fields, mutated only through the functions below
  let state: SessionState = "init";
  let lastActivityAt = now();
  let assistantSpeaking = false;
  let assistantFinishedAt: number | null = null;
  let shouldEnd = false;
  let endReason: EndReason | null = null;

  // Resources
  let started = false;
  let autoPausedMusic = false;
  let lease: DeviceLease | null = null;
  let transport: DialogueTransport | null = null;
  let mic: FrameSource | null = null;
  let speaker: SpeakerSink | null = null;

  let startup: Promise<unknown> | null = null;
  let stopPromise: Promise<void> | null = null;
  /** Settles once uplink, downlink and watchdog have all exited */
  let loops: Promise<void> | null = null;
  let commandsInFlight = 0;
  let wakeWatchdog: (() => void) | null = null;

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async function start(): Promise<void> {
    if (started) throw new Error("Dialogue session already started");
    started = true;
    if (shouldEnd) return;

    const opening = open();
    startup = opening.catch(() => undefined);
    try {
      await opening;
    } catch (err) {
      await teardown();
      if (err instanceof StartupAbortedError) {
        log("SESSION", "Session stopped before it finished opening");
        return;
      }
      throw err;
    }

    const running = Promise.all([runUplink(), runDownlink(), runWatchdog()]);
    loops = running.then(
      () => undefined,
      () => undefined
    );
    await running;
    await teardown();
  }

  /** Acquire resources and configure the remote session */
  async function open(): Promise<void> {
    const status = music.getStatus();
    if (status.isPlaying && !status.isPaused) {
      autoPausedMusic = await music.pauseForConversation();
    }
    checkpoint();

    lease = device.acquire("dialogue");
    const opened = await deps.transportFactory({ url, apiKey: config.apiKey });
    transport = opened;
    checkpoint();

    await opened.send({
      type: "session.update",
      session: {
        modalities: ["text", "audio"],
        instructions: config.instructions,
        voice: config.voice,
        input_audio_format: "pcm16",
        output_audio_format: "pcm16",
        input_audio_transcription: { model: TRANSCRIPTION_MODEL },
      },
    });
    checkpoint();

    if (config.greeting) {
      await sendTurn(opened, config.greeting);
      checkpoint();
    }

    mic = backend.openInput({ sampleRate: DIALOGUE_SAMPLE_RATE, frameSamples: DIALOGUE_FRAME_SAMPLES });
    speaker = backend.openOutput(DIALOGUE_SAMPLE_RATE);

    state = "streaming";
    lastActivityAt = now();
    log("SESSION_START", `Conversation started (${config.model}, voice ${config.voice})`);
  }

  function checkpoint(): void {
    if (shouldEnd) throw new StartupAbortedError();
  }

  /** Release everything once. Loops call this and must not wait for themselves. */
  function teardown(): Promise<void> {
    if (!stopPromise) stopPromise = runStop();
    return stopPromise;
  }

  /** External stop: tear down, then wait for the loops to exit */
  async function stop(): Promise<void> {
    await teardown();
    if (loops) await loops;
  }

  async function runStop(): Promise<void> {
    shouldEnd = true;
    if (!endReason) endReason = "stopped";
    if (state === "init" || state === "streaming") state = "ending";
    wakeWatchdog?.();

    // Let an in-progress startup reach its next checkpoint first
    if (startup) await startup;

    runStep("close microphone", () => mic?.close());
    runStep("close speaker", () => speaker?.close());
    runStep("close transport", () => transport?.close());
    runStep("release audio device", () => lease?.release());

    if (autoPausedMusic) {
      autoPausedMusic = false;
      try {
        await music.resumeAfterConversation();
      } catch (err) {
        log("MUSIC_ERROR", `Failed to resume music: ${errorMessage(err)}`);
      }
    }

    state = "closed";
    log("SESSION_END", `Conversation ended (${endReason})`);
  }

  /** Run one teardown step; a failure is logged and does not skip later steps */
  function runStep(name: string, step: () => void): void {
    try {
      step();
    } catch (err) {
      log("SESSION_ERROR", `Failed to ${name}: ${errorMessage(err)}`);
    }
  }

  function endSession(reason: EndReason): Promise<void> {
    if (!shouldEnd) {
      shouldEnd = true;
      endReason = reason;
      if (state === "streaming") state = "ending";
    }
    return teardown();
  }

  async function requestEnd(reason: EndReason): Promise<void> {
    await endSession(reason);
    if (loops) await loops;
  }

  // --------------------------------------------------------------------------
  // Loops
  // --------------------------------------------------------------------------

  async function runUplink(): Promise<void> {
    const source = mic;
    const link = transport;
    if (!source || !link) return;

    while (!shouldEnd) {
      const frame = await source.readFrame();
      if (frame === null) {
        if (!shouldEnd) {
          log("AUDIO_ERROR", "Microphone stream ended");
          await endSession("uplink_failed");
        }
        return;
      }

      if (computeRms(frame) > SPEECH_RMS_THRESHOLD) {
        lastActivityAt = now();
      }

      try {
        await link.send({ type: "input_audio_buffer.append", audio: frame.toString("base64") });
      } catch (err) {
        if (!shouldEnd) {
          log("TRANSPORT_ERROR", `Failed to send audio: ${errorMessage(err)}`);
          await endSession("uplink_failed");
        }
        return;
      }
    }
  }

  async function runDownlink(): Promise<void> {
    const link = transport;
    if (!link) return;

    const text = { pending: "" };
    for await (const event of link.events()) {
      if (shouldEnd) break;
      await handleEvent(event, text);
    }

    if (!shouldEnd) {
      log("TRANSPORT_CLOSED", "Dialogue engine closed the connection");
      await endSession("transport_closed");
    }
  }

  async function handleEvent(event: DialogueEvent, text: { pending: string }): Promise<void> {
    switch (event.type) {
      case "user_transcript":
        await handleTranscript(event.text);
        return;

      case "assistant_audio":
        assistantSpeaking = true;
        lastActivityAt = now();
        if (speaker && event.pcm.length > 0) {
          try {
            await speaker.write(event.pcm);
          } catch (err) {
            log("AUDIO_ERROR", `Speaker write failed: ${errorMessage(err)}`);
          }
        }
        return;

      case "assistant_text":
        assistantSpeaking = true;
        text.pending += event.text;
        return;

      case "turn_complete":
        if (text.pending.trim()) {
          log("ASSISTANT_RESPONSE", text.pending.trim());
        }
        text.pending = "";
        assistantSpeaking = false;
        assistantFinishedAt = now();
        return;

      case "speech_started":
        lastActivityAt = now();
        if (assistantSpeaking) {
          assistantSpeaking = false;
          log("BARGE_IN", "User interrupted assistant speech");
        }
        return;

      case "error":
        log("DIALOGUE_ERROR", event.message);
        return;

      case "ignored":
        return;
    }
  }

  async function handleTranscript(raw: string): Promise<void> {
    const transcript = raw.trim();
    if (!transcript) return;
    lastActivityAt = now();
    log("USER_TRANSCRIPT", transcript);

    const command = parseMusicCommand(transcript);
    if (command) {
      // The watchdog skips its checks while a command runs (downloads take a while)
      commandsInFlight++;
      const result = await commands.execute(command).finally(() => {
        commandsInFlight--;
        lastActivityAt = now();
      });
      log("MUSIC_RESPONSE", `${result.action}: ${result.response}`);
      if (command.kind === "play" && result.success) {
        log("MUSIC_STARTED", "Music started, returning to wake-word listening");
        await endSession("music_started");
      }
      return;
    }

    const phrase = matchEndPhrase(transcript);
    if (phrase) {
      log("CONVERSATION_END_DETECTED", `End phrase detected: '${phrase}' in '${transcript}'`);
      await endSession("end_phrase");
    }
  }

  async function runWatchdog(): Promise<void> {
    while (!shouldEnd) {
      await sleep(tickMs);
      if (shouldEnd) return;
      if (commandsInFlight > 0) continue;

      const current = now();
      const expired = isSilenceExpired(lastActivityAt, {
        baseMs: config.silenceTimeoutMs,
        graceMs: config.silenceGraceMs,
        assistantFinishedAt,
        now: current,
      });
      if (expired) {
        log("SILENCE_TIMEOUT", `No activity for ${current - lastActivityAt}ms, ending conversation`);
        await endSession("silence_timeout");
      }
    }
  }

  /** Sleep that stop() can cut short */
  function sleep(ms: number): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        wakeWatchdog = null;
        resolve();
      };
      const timer = setTimeout(done, ms);
      wakeWatchdog = done;
    });
  }

  // --------------------------------------------------------------------------
  // Programmatic turns and snapshot
  // --------------------------------------------------------------------------

  async function sendText(text: string): Promise<void> {
    if (state !== "streaming" || !transport) {
      throw new Error(`Cannot send text while the session is ${state}`);
    }
    await sendTurn(transport, text);
  }

  async function sendTurn(link: DialogueTransport, text: string): Promise<void> {
    const item: ClientEvent = {
      type: "conversation.item.create",
      item: { type: "message", role: "user", content: [{ type: "input_text", text }] },
    };
    await link.send(item);
    await link.send({ type: "response.create" });
    log("PROGRAMMATIC_TURN", text);
  }

  function getSnapshot(): SessionSnapshot {
    return { state, lastActivityAt, assistantSpeaking, assistantFinishedAt, shouldEnd, endReason };
  }

  return { start, stop, requestEnd, sendText, getSnapshot };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
