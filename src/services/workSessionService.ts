/**
 * Work Session Service — loads, steps and persists sessions.
 *
 * Each call applies exactly one transition from lifecycle/session.ts and
 * writes it through the store. The store's version check turns a concurrent
 * write to the same session into a ConflictError instead of a lost update.
 */

import { NotFoundError, UnauthorizedError } from "../errors.js";
import {
  advanceSession,
  pauseSession,
  resumeSession,
  retreatSession,
  startSession,
  type AdvanceOutcome,
} from "../lifecycle/session.js";
import { buildStitchLookup, computeProgress } from "../navigation/progress.js";
import type {
  Pattern,
  PatternProvider,
  ProgressReport,
  SessionStore,
  WorkSession,
} from "../types/index.js";

export interface LoadedSession {
  session: WorkSession;
  pattern: Pattern;
}

export type Clock = () => Date;

export class WorkSessionService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly patterns: PatternProvider,
    private readonly clock: Clock = () => new Date(),
  ) {}

  async start(userId: string, patternId: string): Promise<WorkSession> {
    const pattern = await this.patterns.getById(patternId);
    if (!pattern || pattern.userId !== userId) {
      throw new NotFoundError(`Pattern ${patternId} not found`);
    }

    const session = await this.sessions.create(startSession(userId, pattern, this.clock()));
    console.error(`[WorkSession] Started ${session.id} on pattern ${patternId}`);
    return session;
  }

  async getById(sessionId: string): Promise<WorkSession> {
    const session = await this.sessions.getById(sessionId);
    if (!session) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }
    return session;
  }

  async getForUser(userId: string, sessionId: string): Promise<WorkSession> {
    const session = await this.getById(sessionId);
    if (session.userId !== userId) {
      throw new UnauthorizedError(`Session ${sessionId} belongs to another user`);
    }
    return session;
  }

  /** Session plus its pattern, for a session the user owns. */
  async loadForUser(userId: string, sessionId: string): Promise<LoadedSession> {
    const session = await this.getForUser(userId, sessionId);

    const pattern = await this.patterns.getById(session.patternId);
    if (!pattern) {
      throw new NotFoundError(`Pattern ${session.patternId} for session ${sessionId} not found`);
    }
    return { session, pattern };
  }

  listActiveByUser(userId: string): Promise<WorkSession[]> {
    return this.sessions.listActiveByUser(userId);
  }

  listCompletedByUser(userId: string, limit: number, offset: number): Promise<WorkSession[]> {
    return this.sessions.listCompletedByUser(userId, limit, offset);
  }

  countCompletedByUser(userId: string): Promise<number> {
    return this.sessions.countCompletedByUser(userId);
  }

  async advance(session: WorkSession, pattern: Pattern): Promise<AdvanceOutcome> {
    const outcome = advanceSession(session, pattern, this.clock());
    const saved = await this.sessions.update(outcome.session);
    if (outcome.completed) {
      console.error(`[WorkSession] Completed ${saved.id} (pattern ${saved.patternId})`);
    }
    return { session: saved, completed: outcome.completed };
  }

  async retreat(session: WorkSession, pattern: Pattern): Promise<WorkSession> {
    return this.sessions.update(retreatSession(session, pattern, this.clock()));
  }

  async pause(session: WorkSession): Promise<WorkSession> {
    return this.sessions.update(pauseSession(session, this.clock()));
  }

  async resume(session: WorkSession): Promise<WorkSession> {
    return this.sessions.update(resumeSession(session, this.clock()));
  }

  async abandon(sessionId: string): Promise<void> {
    await this.sessions.delete(sessionId);
    console.error(`[WorkSession] Abandoned ${sessionId}`);
  }

  progress(session: WorkSession, pattern: Pattern): ProgressReport {
    return computeProgress(session, pattern, buildStitchLookup(pattern.stitches));
  }
}
