/**
 * Unit tests for the event log.
 *
 * Run: npx tsx --test assistant/event-log.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";
import { mkdtempSync, readFileSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";

import { createEventLog, formatTimestamp } from "./event-log.js";

test("formatTimestamp pads every field", () => {
  assert.equal(formatTimestamp(new Date(2024, 0, 5, 7, 8, 9)), "2024-01-05 07:08:09");
});

test("events are appended to the log file in order", async () => {
  const dir = mkdtempSync(join(tmpdir(), "event-log-"));
  const logFile = join(dir, "nested", "assistant.log");

  try {
    const eventLog = createEventLog(logFile, () => new Date(2024, 4, 1, 12, 30, 0));
    eventLog.log("WAKE_WORD_DETECTED", "Hi Taco");
    eventLog.log("BARGE_IN", "User interrupted assistant speech");
    await eventLog.close();

    assert.equal(
      readFileSync(logFile, "utf-8"),
      "2024-05-01 12:30:00 | WAKE_WORD_DETECTED | Hi Taco\n" +
      "2024-05-01 12:30:00 | BARGE_IN | User interrupted assistant speech\n"
    );
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("close without a file resolves immediately", async () => {
  const eventLog = createEventLog(null);
  await eventLog.close();
  await eventLog.close();
});
