/**
 * Unit tests for the assistant loop with fake listener, cues, music and sessions.
 *
 * Run: npx tsx --test assistant/orchestrator.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { createOrchestrator, type Orchestrator } from "./orchestrator.js";

import type { DialogueSession } from "./dialogue-session.js";
import type { MusicStatus } from "./types.js";
import type { WakeWordListener } from "./wake-word.js";

// ============================================================================
// HELPERS
// ============================================================================

/** Poll step: the mic stream ended, so the listener stopped itself */
const MIC_ENDED = Symbol("mic ended");

type PollStep = string | null | Error | typeof MIC_ENDED;

const STOPPED: MusicStatus = { status: "stopped", isPlaying: false, isPaused: false, currentSong: null };
const PLAYING: MusicStatus = { status: "playing", isPlaying: true, isPaused: false, currentSong: null };

type SessionBehavior = "finish" | "hang" | "fail";

interface Harness {
  orchestrator: Orchestrator;
  timeline: string[];
  logs: string[];
  delays: number[];
  sessionStarted: Promise<void>;
}

/**
 * Build an orchestrator over fakes. Once the poll script is used up, the
 * listener shuts the orchestrator down.
 */
function harness(options: {
  polls: PollStep[];
  session?: SessionBehavior;
  music?: MusicStatus;
  conversationTimeoutMs?: number;
}): Harness {
  const timeline: string[] = [];
  const logs: string[] = [];
  const delays: number[] = [];
  const script = [...options.polls];
  let listening = false;
  let orchestrator: Orchestrator | null = null;
  let markStarted: () => void = () => {};
  const sessionStarted = new Promise<void>((resolve) => {
    markStarted = resolve;
  });

  const listener: WakeWordListener = {
    start: () => {
      listening = true;
    },
    poll: async () => {
      timeline.push("poll");
      listening = true;
      if (script.length === 0) {
        await orchestrator?.shutdown();
        return null;
      }
      const step = script.shift();
      if (step instanceof Error) throw step;
      if (step === MIC_ENDED) {
        listening = false;
        return null;
      }
      return step ?? null;
    },
    stop: () => {
      timeline.push("stop");
      listening = false;
    },
    destroy: () => {
      timeline.push("destroy");
    },
    isListening: () => listening,
  };

  function createSession(): DialogueSession {
    let finish: () => void = () => {};
    const ended = new Promise<void>((resolve) => {
      finish = resolve;
    });
    return {
      start: async () => {
        timeline.push("start");
        markStarted();
        if (options.session === "fail") throw new Error("no network");
        if (options.session === "hang") await ended;
      },
      stop: async () => {
        timeline.push("session.stop");
        finish();
      },
      requestEnd: async () => {},
      sendText: async () => {},
      getSnapshot: () => ({
        state: "closed",
        lastActivityAt: 0,
        assistantSpeaking: false,
        assistantFinishedAt: null,
        shouldEnd: true,
        endReason: "stopped",
      }),
    };
  }

  orchestrator = createOrchestrator({
    listener,
    cues: {
      acknowledge: async () => {
        timeline.push("ack");
      },
      transition: async () => {
        timeline.push("transition");
      },
    },
    music: {
      getStatus: () => options.music ?? STOPPED,
      cleanup: async () => {
        timeline.push("music.cleanup");
      },
    },
    createSession,
    log: (type, message) => logs.push(`${type}: ${message}`),
    conversationTimeoutMs: options.conversationTimeoutMs ?? 10_000,
    delay: async (ms) => {
      delays.push(ms);
    },
  });

  return { orchestrator, timeline, logs, delays, sessionStarted };
}

// ============================================================================
// TESTS
// ============================================================================

test("a wake word runs one conversation between the two cues", async () => {
  const h = harness({ polls: [null, "Hi Taco"] });

  await h.orchestrator.run();

  assert.deepEqual(h.timeline, [
    "poll",
    "poll",
    "stop",
    "ack",
    "start",
    "transition",
    "poll",
    "stop",
    "destroy",
    "music.cleanup",
  ]);
  assert.ok(h.logs.includes("CONVERSATION_START: Wake word 'Hi Taco' detected, starting conversation"));
  assert.deepEqual(h.delays, []);
});

test("the transition cue is skipped while music plays", async () => {
  const h = harness({ polls: ["Hi Taco"], music: PLAYING });

  await h.orchestrator.run();

  assert.equal(h.timeline.includes("transition"), false);
  assert.ok(h.logs.includes("BYE_BYE_SKIP: Skipped transition cue due to active music playback"));
});

test("a conversation that outlives the timeout is stopped", async () => {
  const h = harness({ polls: ["Hi Taco"], session: "hang", conversationTimeoutMs: 20 });

  await h.orchestrator.run();

  assert.deepEqual(h.timeline.slice(3, 6), ["start", "session.stop", "transition"]);
  assert.ok(h.logs.some((line) => line.startsWith("CONVERSATION_TIMEOUT: ")));
});

test("a session that fails to open is logged and listening resumes", async () => {
  const h = harness({ polls: ["Hi Taco"], session: "fail" });

  await h.orchestrator.run();

  assert.ok(h.logs.includes("CONVERSATION_ERROR: Failed to start conversation: no network"));
  assert.deepEqual(h.timeline.slice(3, 6), ["start", "transition", "poll"]);
});

test("shutdown during a conversation stops the session and skips the cue", async () => {
  const h = harness({ polls: ["Hi Taco"], session: "hang" });

  const running = h.orchestrator.run();
  await h.sessionStarted;
  await h.orchestrator.shutdown();
  await running;

  assert.deepEqual(h.timeline, ["poll", "stop", "ack", "start", "stop", "session.stop", "destroy", "music.cleanup"]);
});

test("listener failures and ended mic streams wait before polling again", async () => {
  const h = harness({ polls: [new Error("device busy"), MIC_ENDED, "Hi Taco"] });

  await h.orchestrator.run();

  assert.deepEqual(h.delays, [1_000, 1_000]);
  assert.ok(h.logs.includes("WAKE_WORD_ERROR: Wake-word listening failed: device busy"));
  assert.deepEqual(h.timeline.slice(0, 5), ["poll", "stop", "poll", "poll", "stop"]);
});

test("cleanup runs once", async () => {
  const h = harness({ polls: [] });

  await h.orchestrator.run();
  await h.orchestrator.cleanup();

  assert.equal(h.timeline.filter((entry) => entry === "music.cleanup").length, 1);
  assert.equal(h.timeline.filter((entry) => entry === "destroy").length, 1);
});
