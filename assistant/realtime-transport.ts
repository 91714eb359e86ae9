/**
 * Realtime dialogue transport over a WebSocket.
 *
 * Connects to the realtime dialogue endpoint with the API key, sends client
 * events as JSON and exposes inbound server events as an async iterable of
 * DialogueEvent. Server event types the session does not handle come through
 * as `ignored`.
 *
 * Responsibilities:
 * - Open the socket (bearer auth + beta header) with a connect timeout
 * - Serialize outbound ClientEvents
 * - Parse inbound events into the DialogueEvent union
 * - End the event stream when the socket closes
 */

import WebSocket from "ws";

import { isRecord } from "./music-cache.js";

import type { ClientEvent, DialogueEvent } from "./types.js";

// ============================================================================
// CONSTANTS
// ============================================================================

export const REALTIME_BASE_URL = "wss://api.openai.com/v1/realtime";

const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

// ============================================================================
// ASYNC QUEUE
// ============================================================================

/** Push queue read as an async iterable; ends after close() once drained. */
class AsyncQueue<T> implements AsyncIterable<T> {
  private buf: T[] = [];
  private resolve: ((r: IteratorResult<T, undefined>) => void) | null = null;
  private done = false;

  push(item: T) {
    if (this.done) return;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: item, done: false });
    } else {
      this.buf.push(item);
    }
  }

  close() {
    this.done = true;
    if (this.resolve) {
      const r = this.resolve;
      this.resolve = null;
      r({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: (): Promise<IteratorResult<T, undefined>> => {
        if (this.buf.length > 0) {
          const [item] = this.buf.splice(0, 1);
          if (item !== undefined) return Promise.resolve({ value: item, done: false });
        }
        if (this.done) {
          return Promise.resolve({ value: undefined, done: true });
        }
        return new Promise<IteratorResult<T, undefined>>((r) => { this.resolve = r; });
      },
    };
  }
}

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Full-duplex connection to the dialogue engine.
 */
export interface DialogueTransport {
  /** Send one client event. Rejects when the socket is closed or the write fails. */
  send: (event: ClientEvent) => Promise<void>;
  /** Inbound events; the iteration ends when the socket closes */
  events: () => AsyncIterable<DialogueEvent>;
  /** Close the socket. Idempotent. */
  close: () => void;
}

/** Options for opening a transport */
export interface TransportOptions {
  /** Full WebSocket URL including the model query parameter */
  url: string;
  apiKey: string;
  connectTimeoutMs?: number;
}

/** Opens a transport; injectable so sessions can be tested without a network */
export type TransportFactory = (options: TransportOptions) => Promise<DialogueTransport>;

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Build the endpoint URL for a model.
 *
 * @param model - Realtime model identifier
 * @param baseUrl - Endpoint base URL
 */
export function realtimeUrl(model: string, baseUrl: string = REALTIME_BASE_URL): string {
  return `${baseUrl}?model=${encodeURIComponent(model)}`;
}

/**
 * Open the WebSocket and wait for it to be ready.
 *
 * @param options - URL, API key and connect timeout
 * @returns An open DialogueTransport
 * @throws Error if the connection fails or times out
 */
export function connectRealtimeTransport(options: TransportOptions): Promise<DialogueTransport> {
  const ws = new WebSocket(options.url, {
    headers: {
      Authorization: `Bearer ${options.apiKey}`,
      "OpenAI-Beta": "realtime=v1",
    },
  });
  const queue = new AsyncQueue<DialogueEvent>();

  ws.on("message", (data: WebSocket.RawData) => {
    queue.push(parseServerEvent(rawDataToString(data)));
  });
  ws.on("close", () => queue.close());

  const transport: DialogueTransport = {
    send(event: ClientEvent): Promise<void> {
      if (ws.readyState !== WebSocket.OPEN) {
        return Promise.reject(new Error("Dialogue transport is closed"));
      }
      return new Promise<void>((resolve, reject) => {
        ws.send(JSON.stringify(event), (err?: Error) => {
          if (err) reject(err);
          else resolve();
        });
      });
    },
    events: () => queue,
    close() {
      if (ws.readyState === WebSocket.CLOSED || ws.readyState === WebSocket.CLOSING) return;
      if (ws.readyState === WebSocket.CONNECTING) ws.terminate();
      else ws.close(1000, "session ended");
    },
  };

  return new Promise<DialogueTransport>((resolve, reject) => {
    const timer = setTimeout(() => {
      ws.terminate();
      reject(new Error(`Dialogue connection timed out after ${options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS}ms`));
    }, options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS);

    ws.once("open", () => {
      clearTimeout(timer);
      ws.on("error", (err: Error) => {
        queue.push({ type: "error", message: `transport error: ${err.message}` });
      });
      resolve(transport);
    });
    ws.once("error", (err: Error) => {
      clearTimeout(timer);
      reject(new Error(`Dialogue connection failed: ${err.message}`));
    });
  });
}

/**
 * Parse one inbound server message.
 *
 * @param raw - Message text
 * @returns The narrowed event
 */
export function parseServerEvent(raw: string): DialogueEvent {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { type: "error", message: "Malformed server event" };
  }
  if (!isRecord(parsed) || typeof parsed.type !== "string") {
    return { type: "error", message: "Server event without a type" };
  }

  const text = (value: unknown): string => (typeof value === "string" ? value : "");

  switch (parsed.type) {
    case "conversation.item.input_audio_transcription.completed":
      return { type: "user_transcript", text: text(parsed.transcript) };
    case "response.audio.delta":
      return { type: "assistant_audio", pcm: Buffer.from(text(parsed.delta), "base64") };
    case "response.text.delta":
    case "response.audio_transcript.delta":
      return { type: "assistant_text", text: text(parsed.delta) };
    case "response.done":
      return { type: "turn_complete" };
    case "input_audio_buffer.speech_started":
      return { type: "speech_started" };
    case "error": {
      const detail = isRecord(parsed.error) ? text(parsed.error.message) : "";
      return { type: "error", message: detail || "Unknown error" };
    }
    default:
      return { type: "ignored", rawType: parsed.type };
  }
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf-8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf-8");
  return Buffer.from(data).toString("utf-8");
}
