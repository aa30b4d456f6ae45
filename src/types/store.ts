/**
 * Collaborator contracts. Persistence lives behind these, no business logic.
 */

import type { Pattern, PatternStitch } from "./pattern.js";
import type { NewWorkSession, WorkSession } from "./session.js";

export interface PatternProvider {
  /** Returns null when the pattern does not exist. Ownership is checked by the caller. */
  getById(patternId: string): Promise<Pattern | null>;
}

export interface SessionStore {
  create(session: NewWorkSession): Promise<WorkSession>;
  getById(sessionId: string): Promise<WorkSession | null>;
  /** Active and paused sessions, most recent activity first */
  listActiveByUser(userId: string): Promise<WorkSession[]>;
  /** Completed sessions, most recently completed first */
  listCompletedByUser(userId: string, limit: number, offset: number): Promise<WorkSession[]>;
  countCompletedByUser(userId: string): Promise<number>;
  /**
   * Persist `session` if the stored version still equals `session.version`.
   * Returns the stored session with its version bumped.
   * Throws NotFoundError or ConflictError.
   */
  update(session: WorkSession): Promise<WorkSession>;
  /** Throws NotFoundError when the session does not exist */
  delete(sessionId: string): Promise<void>;
}

/** Resolves a stitch id to its display abbreviation and name */
export type StitchLookup = (stitchId: string) => PatternStitch | undefined;
