/**
 * One user's live progress through one pattern.
 */

import type { SessionStatus } from "../lifecycle/engine.js";

/**
 * Five-level counter locating the current stitch. All fields zero-based:
 * which stitch of which repeat of which entry of which repeat of which group.
 */
export interface Position {
  groupIndex: number;
  groupRepeat: number;
  entryIndex: number;
  entryRepeat: number;
  stitchOrdinal: number;
}

/** Stored at work_sessions/{id} */
export interface WorkSession {
  id: string;
  userId: string;
  patternId: string;

  position: Position;
  status: SessionStatus;

  // Timestamps (ISO 8601)
  startedAt: string;
  lastActivityAt: string;
  completedAt: string | null;

  /** Optimistic concurrency token, bumped by every stored update */
  version: number;
}

/** A session before the store has assigned it an id */
export type NewWorkSession = Omit<WorkSession, "id">;
