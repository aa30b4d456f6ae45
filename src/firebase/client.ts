import * as admin from "firebase-admin";

let db: admin.firestore.Firestore | undefined;

export function initializeFirebase(projectId: string): void {
  if (admin.apps.length === 0) {
    console.error(`[Firebase] Initializing with projectId: ${projectId}`);
    admin.initializeApp({ projectId });
  }
  db = admin.firestore();
  console.error(`[Firebase] Firestore initialized`);
}

export function getFirestore(): admin.firestore.Firestore {
  if (!db) {
    throw new Error("Firebase not initialized. Call initializeFirebase first.");
  }
  return db;
}
