/**
 * Silence timeout policy for a dialogue session.
 *
 * The base timeout is extended by a grace period while the assistant has
 * just finished a turn, giving the user time to start answering.
 */

/**
 * Inputs to the silence policy. All times are epoch ms.
 */
export interface SilenceInputs {
  baseMs: number;
  graceMs: number;
  /** When the last assistant turn completed, or null if none has */
  assistantFinishedAt: number | null;
  now: number;
}

/**
 * Effective silence timeout: base + grace inside the grace window after a
 * completed assistant turn, otherwise base.
 */
export function effectiveSilenceTimeout(inputs: SilenceInputs): number {
  const { baseMs, graceMs, assistantFinishedAt, now } = inputs;
  if (assistantFinishedAt !== null && now - assistantFinishedAt < graceMs) {
    return baseMs + graceMs;
  }
  return baseMs;
}

/**
 * Whether the silence since the last activity exceeds the effective timeout.
 *
 * @param lastActivityAt - Epoch ms of the last user or assistant activity
 * @param inputs - Policy inputs
 */
export function isSilenceExpired(lastActivityAt: number, inputs: SilenceInputs): boolean {
  return inputs.now - lastActivityAt > effectiveSilenceTimeout(inputs);
}
