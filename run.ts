/**
 * Entry point for the wake-word voice assistant.
 *
 * Loads configuration, builds every component in dependency order, runs the
 * orchestrator and shuts down cleanly on SIGINT/SIGTERM.
 *
 * Usage: node --import tsx run.ts [--env <path>]
 *
 * Construction order: event log -> audio backend -> audio device -> music
 * engine -> wake-word listener -> sound cues -> orchestrator. Cleanup runs in
 * reverse.
 */

import "dotenv/config";

import { createAudioDevice } from "./assistant/audio-device.js";
import { loadConfig } from "./assistant/config.js";
import { createDialogueSession } from "./assistant/dialogue-session.js";
import { createEventLog } from "./assistant/event-log.js";
import { createLocalAudioBackend } from "./assistant/local-audio.js";
import { openMusicCache } from "./assistant/music-cache.js";
import { createFfmpegTranscoder, createYtDlpCatalog } from "./assistant/music-catalog.js";
import { createMusicCommandHandler } from "./assistant/music-commands.js";
import { createMusicEngine } from "./assistant/music-engine.js";
import { launchFfplay } from "./assistant/music-playback.js";
import { createOrchestrator } from "./assistant/orchestrator.js";
import { connectRealtimeTransport } from "./assistant/realtime-transport.js";
import { createSoundCues } from "./assistant/sound-cues.js";
import { createPorcupineDetector, createWakeWordListener } from "./assistant/wake-word.js";
import { mergeEnv, readEnv } from "./services/env.js";

import type { EventLog } from "./assistant/event-log.js";
import type { AssistantConfig } from "./assistant/types.js";

// ============================================================================
// MAIN ENTRYPOINT
// ============================================================================

/**
 * Build the assistant and run it until a shutdown signal.
 *
 * @returns Resolves after cleanup
 */
async function main(): Promise<void> {
  const config = await resolveConfig(process.argv.slice(2));
  const eventLog = createEventLog(config.logFile);
  const { log } = eventLog;

  try {
    console.log("Initializing audio...");
    const backend = await createLocalAudioBackend(config.audio);
    const device = createAudioDevice();

    console.log("Initializing music engine...");
    const cache = await openMusicCache(config.music.cacheDir, log);
    const music = createMusicEngine({
      cache,
      catalog: createYtDlpCatalog(),
      transcoder: createFfmpegTranscoder(),
      launch: launchFfplay,
      log,
      searchLimit: config.music.searchLimit,
    });

    console.log("Initializing wake-word detector...");
    const detector = await createPorcupineDetector(config.wakeWord).catch(async (err: unknown) => {
      await music.cleanup();
      throw err;
    });
    const listener = createWakeWordListener({ detector, backend, device, log });

    const cues = createSoundCues({ backend, cueDir: config.cueDir, log });
    const commands = createMusicCommandHandler(music, log);

    const orchestrator = createOrchestrator({
      listener,
      cues,
      music,
      createSession: () =>
        createDialogueSession({
          config: config.dialogue,
          transportFactory: connectRealtimeTransport,
          backend,
          device,
          music,
          commands,
          log,
        }),
      log,
      conversationTimeoutMs: config.conversationTimeoutMs,
    });

    const signalHandler = (): void => {
      console.log("\nShutdown signal received...");
      orchestrator.shutdown().catch((err: unknown) => {
        console.error(`Shutdown failed: ${err instanceof Error ? err.message : String(err)}`);
      });
    };
    process.on("SIGINT", signalHandler);
    process.on("SIGTERM", signalHandler);

    console.log(`Wake word: ${detector.keywords.join(", ")}. Press Ctrl+C to exit.`);
    await orchestrator.run();
  } finally {
    await closeLog(eventLog);
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Load configuration from the environment, layering an optional
 * `--env <path>` file under it.
 *
 * @param args - Command-line arguments after the script name
 * @returns The assistant configuration
 * @throws Error on an unreadable env file or missing required settings
 */
async function resolveConfig(args: string[]): Promise<AssistantConfig> {
  const flag = args.indexOf("--env");
  if (flag === -1) return loadConfig(process.env);

  const envPath = args[flag + 1];
  if (!envPath) throw new Error("--env requires a file path");
  return loadConfig(mergeEnv(await readEnv(envPath), process.env));
}

async function closeLog(eventLog: EventLog): Promise<void> {
  try {
    await eventLog.close();
  } catch (err) {
    console.error(`Failed to close event log: ${err instanceof Error ? err.message : String(err)}`);
  }
}

// ============================================================================
// ENTRY POINT
// ============================================================================

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error(`Startup failed: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
);
