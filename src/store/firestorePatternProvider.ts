/**
 * Firestore Pattern Provider: read-only access to authored patterns.
 * Collection: patterns/{patternId} (groups and stitch table embedded)
 */

import { getFirestore } from "../firebase/client.js";
import { PatternDocSchema, parseDocument } from "./schemas.js";
import type { Pattern, PatternProvider } from "../types/index.js";

export const PATTERNS_COLLECTION = "patterns";

export class FirestorePatternProvider implements PatternProvider {
  async getById(patternId: string): Promise<Pattern | null> {
    const snapshot = await getFirestore().collection(PATTERNS_COLLECTION).doc(patternId).get();
    if (!snapshot.exists) return null;
    const doc = parseDocument(PatternDocSchema, `${PATTERNS_COLLECTION}/${patternId}`, snapshot.data());
    return { id: snapshot.id, ...doc };
  }
}
