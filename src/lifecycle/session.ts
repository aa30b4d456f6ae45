/**
 * Session transitions: pure functions from one WorkSession value to the next.
 * Persistence is the caller's job; nothing here touches a store.
 */

import { InvalidInputError } from "../errors.js";
import { advance, firstPosition, retreat } from "../navigation/position.js";
import { transition } from "./engine.js";
import type { NewWorkSession, Pattern, WorkSession } from "../types/index.js";

export interface AdvanceOutcome {
  session: WorkSession;
  completed: boolean;
}

function requireActive(session: WorkSession, action: string): void {
  if (session.status !== "active") {
    throw new InvalidInputError(`Cannot ${action} session ${session.id}: session is ${session.status}`);
  }
}

function requirePattern(session: WorkSession, pattern: Pattern): void {
  if (session.patternId !== pattern.id) {
    throw new InvalidInputError(
      `Session ${session.id} tracks pattern ${session.patternId}, not ${pattern.id}`,
    );
  }
}

/**
 * New active session on the first stitch of `pattern`.
 * Ownership is checked by the caller.
 */
export function startSession(userId: string, pattern: Pattern, now: Date): NewWorkSession {
  const position = firstPosition(pattern);
  if (!position) {
    throw new InvalidInputError(`Pattern ${pattern.id} has no stitches to track`);
  }
  const timestamp = now.toISOString();
  return {
    userId,
    patternId: pattern.id,
    position,
    status: "active",
    startedAt: timestamp,
    lastActivityAt: timestamp,
    completedAt: null,
    version: 0,
  };
}

/**
 * One stitch forward. Stepping past the last stitch completes the session and
 * leaves the position on that last stitch.
 */
export function advanceSession(session: WorkSession, pattern: Pattern, now: Date): AdvanceOutcome {
  requireActive(session, "advance");
  requirePattern(session, pattern);

  const step = advance(session.position, pattern);
  const timestamp = now.toISOString();

  if (step.completed) {
    return {
      session: {
        ...session,
        status: transition(session.status, "completed"),
        completedAt: timestamp,
        lastActivityAt: timestamp,
      },
      completed: true,
    };
  }

  return {
    session: { ...session, position: step.position, lastActivityAt: timestamp },
    completed: false,
  };
}

/** One stitch back; a no-op on the first stitch. */
export function retreatSession(session: WorkSession, pattern: Pattern, now: Date): WorkSession {
  requireActive(session, "retreat");
  requirePattern(session, pattern);

  const step = retreat(session.position, pattern);
  return { ...session, position: step.position, lastActivityAt: now.toISOString() };
}

export function pauseSession(session: WorkSession, now: Date): WorkSession {
  return { ...session, status: transition(session.status, "paused"), lastActivityAt: now.toISOString() };
}

export function resumeSession(session: WorkSession, now: Date): WorkSession {
  return { ...session, status: transition(session.status, "active"), lastActivityAt: now.toISOString() };
}
