/**
 * Lifecycle Engine — status state machine for work sessions.
 *
 *   active → paused → active
 *   active → completed (terminal)
 *
 * Abandoning is a hard delete and never appears as a status.
 * No session changes status without going through this gate.
 */

import { InvalidInputError } from "../errors.js";

/** The three stored session states */
export const SESSION_STATUSES = ["active", "paused", "completed"] as const;

export type SessionStatus = (typeof SESSION_STATUSES)[number];

/** Valid transitions per status */
export const TRANSITIONS: Record<SessionStatus, readonly SessionStatus[]> = {
  active: ["paused", "completed"],
  paused: ["active"],
  completed: [],
};

/**
 * Check if a transition is valid.
 */
export function validateTransition(from: SessionStatus, to: SessionStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

/**
 * Perform a lifecycle transition. Returns the new status.
 * Throws if the transition is invalid.
 */
export function transition(current: SessionStatus, target: SessionStatus): SessionStatus {
  if (!validateTransition(current, target)) {
    throw new LifecycleError(`Invalid session transition: ${current} → ${target}`, current, target);
  }
  return target;
}

/**
 * Error thrown when a lifecycle transition is invalid.
 */
export class LifecycleError extends InvalidInputError {
  readonly from: SessionStatus;
  readonly to: SessionStatus;

  constructor(message: string, from: SessionStatus, to: SessionStatus) {
    super(message);
    this.name = "LifecycleError";
    this.from = from;
    this.to = to;
  }
}
