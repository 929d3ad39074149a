/**
 * Restore phases in order. `failed` is terminal and reachable from any phase.
 */
export const RESTORE_PHASES = [
  "idle",
  "restore_requested",
  "restoring",
  "ready",
  "downloaded",
  "verified",
  "extracted",
  "failed",
] as const;

export type RestorePhase = (typeof RESTORE_PHASES)[number];

/**
 * Events that drive phase transitions.
 */
export type RestoreEvent =
  | "instant_access" // tier needs no restore
  | "restore_available" // a restored copy already exists
  | "restore_requested"
  | "restore_ongoing"
  | "restore_completed"
  | "downloaded"
  | "verified"
  | "extracted"
  | "failure";

const TRANSITIONS: Record<RestorePhase, Partial<Record<RestoreEvent, RestorePhase>>> = {
  idle: {
    instant_access: "ready",
    restore_available: "ready",
    restore_requested: "restore_requested",
    // A restore started by an earlier run is still in progress.
    restore_ongoing: "restoring",
  },
  restore_requested: {
    restore_ongoing: "restoring",
    restore_completed: "ready",
  },
  restoring: {
    restore_ongoing: "restoring",
    restore_completed: "ready",
  },
  ready: { downloaded: "downloaded" },
  downloaded: { verified: "verified" },
  verified: { extracted: "extracted" },
  extracted: {},
  failed: {},
};

export class IllegalTransitionError extends Error {
  constructor(
    readonly from: RestorePhase,
    readonly event: RestoreEvent,
  ) {
    super(`Illegal restore transition: ${from} --${event}-->`);
    this.name = "IllegalTransitionError";
  }
}

/**
 * Pure function: given current phase + event, return the next phase.
 */
export function nextPhase(current: RestorePhase, event: RestoreEvent): RestorePhase {
  if (isTerminal(current)) throw new IllegalTransitionError(current, event);
  if (event === "failure") return "failed";
  const next = TRANSITIONS[current][event];
  if (!next) throw new IllegalTransitionError(current, event);
  return next;
}

export function isTerminal(phase: RestorePhase): boolean {
  return phase === "extracted" || phase === "failed";
}
