/**
 * Event log for assistant activity.
 *
 * Every component reports domain events as (type, message) pairs through a
 * LogFn it receives at construction. The event log prints them to the console
 * and, when a log file is configured, appends a timestamped line per event.
 *
 * Responsibilities:
 * - Print events as "[TYPE] message"
 * - Append "YYYY-MM-DD HH:MM:SS | TYPE | message" lines to the log file
 * - Create the log directory on first use
 * - Flush and close the file on shutdown
 */

import { createWriteStream, mkdirSync, type WriteStream } from "fs";
import { dirname } from "path";

import type { LogFn } from "./types.js";

// ============================================================================
// INTERFACES
// ============================================================================

/**
 * Handle to the event log.
 */
export interface EventLog {
  /** Record one event */
  log: LogFn;
  /** Flush pending lines and close the file */
  close: () => Promise<void>;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create an event log.
 *
 * @param logFile - File to append to, or null for console only
 * @param now - Clock, injectable for tests
 * @returns An EventLog
 */
export function createEventLog(logFile: string | null, now: () => Date = () => new Date()): EventLog {
  let file: WriteStream | null = null;

  if (logFile) {
    mkdirSync(dirname(logFile), { recursive: true });
    file = createWriteStream(logFile, { flags: "a", encoding: "utf-8" });
    file.on("error", (err: Error) => {
      console.error(`[log] cannot write ${logFile}: ${err.message}`);
    });
  }

  function log(type: string, message: string): void {
    console.log(`[${type}] ${message}`);
    if (file) {
      file.write(`${formatTimestamp(now())} | ${type} | ${message}\n`);
    }
  }

  function close(): Promise<void> {
    const stream = file;
    file = null;
    if (!stream) return Promise.resolve();
    return new Promise<void>((resolve) => {
      stream.end(() => resolve());
    });
  }

  return { log, close };
}

// ============================================================================
// HELPER FUNCTIONS
// ============================================================================

/**
 * Format a date as local "YYYY-MM-DD HH:MM:SS".
 *
 * @param date - The date to format
 * @returns Formatted timestamp
 */
export function formatTimestamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}
