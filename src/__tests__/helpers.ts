import { ConflictError, NotFoundError } from "../errors";
import type {
  AuthContext,
  InstructionGroup,
  NewWorkSession,
  Pattern,
  PatternProvider,
  SessionStore,
  StitchEntry,
  WorkSession,
} from "../types";

export function mockAuth(overrides?: Partial<AuthContext>): AuthContext {
  return {
    userId: "test-user-123",
    ...overrides,
  };
}

export const STITCHES = [
  { id: "st-ch", abbreviation: "ch", name: "Chain" },
  { id: "st-sc", abbreviation: "sc", name: "Single Crochet" },
  { id: "st-hdc", abbreviation: "hdc", name: "Half Double Crochet" },
  { id: "st-dc", abbreviation: "dc", name: "Double Crochet" },
];

export function entry(stitchId: string, count: number, repeatCount = 1): StitchEntry {
  return { stitchId, count, repeatCount };
}

export function group(id: string, entries: StitchEntry[], repeatCount = 1): InstructionGroup {
  return { id, label: `Round ${id}`, repeatCount, entries };
}

export function makePattern(groups: InstructionGroup[], overrides?: Partial<Pattern>): Pattern {
  return {
    id: "pattern-1",
    userId: "test-user-123",
    name: "Granny Square",
    groups,
    stitches: STITCHES,
    ...overrides,
  };
}

/** Clock that ticks one second per call, starting at 2024-03-01T10:00:00Z */
export function steppingClock(): () => Date {
  let tick = 0;
  return () => new Date(Date.UTC(2024, 2, 1, 10, 0, tick++));
}

/** In-process SessionStore with the same version semantics as the Firestore store. */
export class MemorySessionStore implements SessionStore {
  readonly docs = new Map<string, WorkSession>();
  private nextId = 1;

  async create(session: NewWorkSession): Promise<WorkSession> {
    const created: WorkSession = { ...session, id: `session-${this.nextId++}` };
    this.docs.set(created.id, created);
    return { ...created };
  }

  async getById(sessionId: string): Promise<WorkSession | null> {
    const stored = this.docs.get(sessionId);
    return stored ? { ...stored } : null;
  }

  async listActiveByUser(userId: string): Promise<WorkSession[]> {
    return [...this.docs.values()]
      .filter((s) => s.userId === userId && s.status !== "completed")
      .sort((a, b) => b.lastActivityAt.localeCompare(a.lastActivityAt));
  }

  async listCompletedByUser(userId: string, limit: number, offset: number): Promise<WorkSession[]> {
    return [...this.docs.values()]
      .filter((s) => s.userId === userId && s.status === "completed")
      .sort((a, b) => (b.completedAt ?? "").localeCompare(a.completedAt ?? ""))
      .slice(offset, offset + limit);
  }

  async countCompletedByUser(userId: string): Promise<number> {
    return [...this.docs.values()].filter((s) => s.userId === userId && s.status === "completed").length;
  }

  async update(session: WorkSession): Promise<WorkSession> {
    const stored = this.docs.get(session.id);
    if (!stored) throw new NotFoundError(`Session ${session.id} not found`);
    if (stored.version !== session.version) {
      throw new ConflictError(`Session ${session.id} was modified concurrently`, session.version, stored.version);
    }
    const next = { ...session, version: session.version + 1 };
    this.docs.set(next.id, next);
    return { ...next };
  }

  async delete(sessionId: string): Promise<void> {
    if (!this.docs.delete(sessionId)) throw new NotFoundError(`Session ${sessionId} not found`);
  }
}

export class MemoryPatternProvider implements PatternProvider {
  private readonly patterns = new Map<string, Pattern>();

  constructor(patterns: Pattern[] = []) {
    for (const pattern of patterns) this.patterns.set(pattern.id, pattern);
  }

  async getById(patternId: string): Promise<Pattern | null> {
    return this.patterns.get(patternId) ?? null;
  }
}
