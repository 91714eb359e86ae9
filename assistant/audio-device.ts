/**
 * Exclusive ownership token for the machine's microphone/speaker.
 *
 * The wake-word listener and the dialogue session both need the audio device,
 * never at the same time. Each takes a lease before opening streams and releases
 * it when done; a second acquire while a lease is outstanding is refused.
 *
 * Responsibilities:
 * - Hand out at most one DeviceLease at a time
 * - Report the current owner for diagnostics
 * - Release an outstanding lease on process exit
 */

// ============================================================================
// INTERFACES
// ============================================================================

/** Who may hold the audio device */
export type DeviceOwner = "wake-word" | "dialogue";

/**
 * Handle returned by acquire(). Call release() to free the device.
 */
export interface DeviceLease {
  /** The component holding this lease */
  owner: DeviceOwner;
  /** Release the device. Safe to call more than once. */
  release: () => void;
}

/**
 * The shared audio device.
 */
export interface AudioDevice {
  /**
   * Take the device for the given owner.
   * @throws Error if another lease is outstanding
   */
  acquire: (owner: DeviceOwner) => DeviceLease;
  /** Current owner, or null when the device is free */
  currentOwner: () => DeviceOwner | null;
}

// ============================================================================
// MAIN HANDLERS
// ============================================================================

/**
 * Create the audio device token.
 *
 * @returns An AudioDevice with no current owner
 */
export function createAudioDevice(): AudioDevice {
  let holder: { owner: DeviceOwner; id: number } | null = null;
  let nextId = 1;

  function acquire(owner: DeviceOwner): DeviceLease {
    if (holder) {
      throw new Error(`Audio device is busy (held by ${holder.owner}, requested by ${owner})`);
    }

    const id = nextId++;
    holder = { owner, id };
    let released = false;

    /** Free the device if this lease still holds it */
    function release(): void {
      if (released) return;
      released = true;
      process.off("exit", release);
      if (holder && holder.id === id) {
        holder = null;
      }
    }

    // Safety net: release on process exit
    process.on("exit", release);

    return { owner, release };
  }

  function currentOwner(): DeviceOwner | null {
    return holder ? holder.owner : null;
  }

  return { acquire, currentOwner };
}
