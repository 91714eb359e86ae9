/**
 * Unit tests for the silence timeout policy.
 *
 * Run: npx tsx --test assistant/silence-watchdog.test.ts
 */

import { test } from "node:test";
import { strict as assert } from "node:assert";

import { effectiveSilenceTimeout, isSilenceExpired } from "./silence-watchdog.js";

const BASE = 5_000;
const GRACE = 4_000;

test("base timeout applies before any assistant turn", () => {
  assert.equal(effectiveSilenceTimeout({ baseMs: BASE, graceMs: GRACE, assistantFinishedAt: null, now: 10_000 }), BASE);
});

test("grace extends the timeout only inside the grace window", () => {
  const at = (now: number) =>
    effectiveSilenceTimeout({ baseMs: BASE, graceMs: GRACE, assistantFinishedAt: 10_000, now });

  assert.equal(at(10_000), 9_000);
  assert.equal(at(13_999), 9_000);
  assert.equal(at(14_000), BASE);
  assert.equal(at(20_000), BASE);
});

test("the effective timeout is never below the base", () => {
  for (const finished of [null, 0, 5_000, 9_999, 10_000]) {
    for (const now of [10_000, 12_000, 30_000]) {
      const timeout = effectiveSilenceTimeout({ baseMs: BASE, graceMs: GRACE, assistantFinishedAt: finished, now });
      assert.ok(timeout >= BASE);
    }
  }
});

test("silence expires strictly after the effective timeout", () => {
  const inputs = (now: number, finished: number | null) =>
    ({ baseMs: BASE, graceMs: GRACE, assistantFinishedAt: finished, now });

  assert.equal(isSilenceExpired(0, inputs(5_000, null)), false);
  assert.equal(isSilenceExpired(0, inputs(5_001, null)), true);
  // Assistant finished at 3s, now 6s: still inside grace, timeout is 9s
  assert.equal(isSilenceExpired(0, inputs(6_000, 3_000)), false);
  // Grace window over at 7s, base applies again
  assert.equal(isSilenceExpired(0, inputs(7_000, 3_000)), true);
});
