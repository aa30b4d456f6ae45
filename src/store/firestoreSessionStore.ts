/**
 * Firestore Session Store — work sessions as top-level documents.
 * Collection: work_sessions/{sessionId}
 */

import { getFirestore } from "../firebase/client.js";
import { ConflictError, NotFoundError } from "../errors.js";
import { WorkSessionDocSchema, parseDocument } from "./schemas.js";
import type { NewWorkSession, SessionStore, WorkSession } from "../types/index.js";

export const SESSIONS_COLLECTION = "work_sessions";

function toDoc(session: NewWorkSession): NewWorkSession {
  return {
    userId: session.userId,
    patternId: session.patternId,
    position: { ...session.position },
    status: session.status,
    startedAt: session.startedAt,
    lastActivityAt: session.lastActivityAt,
    completedAt: session.completedAt,
    version: session.version,
  };
}

function fromDoc(id: string, data: unknown): WorkSession {
  return { id, ...parseDocument(WorkSessionDocSchema, `${SESSIONS_COLLECTION}/${id}`, data) };
}

export class FirestoreSessionStore implements SessionStore {
  private collection() {
    return getFirestore().collection(SESSIONS_COLLECTION);
  }

  async create(session: NewWorkSession): Promise<WorkSession> {
    const ref = this.collection().doc();
    await ref.set(toDoc(session));
    return { id: ref.id, ...toDoc(session) };
  }

  async getById(sessionId: string): Promise<WorkSession | null> {
    const snapshot = await this.collection().doc(sessionId).get();
    if (!snapshot.exists) return null;
    return fromDoc(snapshot.id, snapshot.data());
  }

  async listActiveByUser(userId: string): Promise<WorkSession[]> {
    const snapshot = await this.collection()
      .where("userId", "==", userId)
      .where("status", "in", ["active", "paused"])
      .orderBy("lastActivityAt", "desc")
      .get();
    return snapshot.docs.map((doc) => fromDoc(doc.id, doc.data()));
  }

  async listCompletedByUser(userId: string, limit: number, offset: number): Promise<WorkSession[]> {
    const snapshot = await this.collection()
      .where("userId", "==", userId)
      .where("status", "==", "completed")
      .orderBy("completedAt", "desc")
      .offset(offset)
      .limit(limit)
      .get();
    return snapshot.docs.map((doc) => fromDoc(doc.id, doc.data()));
  }

  async countCompletedByUser(userId: string): Promise<number> {
    const snapshot = await this.collection()
      .where("userId", "==", userId)
      .where("status", "==", "completed")
      .count()
      .get();
    return snapshot.data().count;
  }

  async update(session: WorkSession): Promise<WorkSession> {
    const ref = this.collection().doc(session.id);

    return getFirestore().runTransaction(async (tx) => {
      const snapshot = await tx.get(ref);
      if (!snapshot.exists) {
        throw new NotFoundError(`Session ${session.id} not found`);
      }

      const stored = fromDoc(snapshot.id, snapshot.data());
      if (stored.version !== session.version) {
        throw new ConflictError(
          `Session ${session.id} was modified concurrently (expected version ${session.version}, found ${stored.version})`,
          session.version,
          stored.version,
        );
      }

      const next: WorkSession = { ...session, version: session.version + 1 };
      tx.set(ref, toDoc(next));
      return next;
    });
  }

  async delete(sessionId: string): Promise<void> {
    const ref = this.collection().doc(sessionId);
    const snapshot = await ref.get();
    if (!snapshot.exists) {
      throw new NotFoundError(`Session ${sessionId} not found`);
    }
    await ref.delete();
  }
}
