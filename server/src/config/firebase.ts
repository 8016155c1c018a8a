import { applicationDefault, cert, getApps, initializeApp, type App } from 'firebase-admin/app';
import { getAuth } from 'firebase-admin/auth';
import { getFirestore } from 'firebase-admin/firestore';

import type { Env } from './env';

export function initFirebase(env: Env): App {
  const existing = getApps()[0];
  if (existing) {
    return existing;
  }

  if (env.FIREBASE_PROJECT_ID && env.FIREBASE_CLIENT_EMAIL && env.FIREBASE_PRIVATE_KEY) {
    console.info('[firebase] using service account credentials');
    return initializeApp({
      credential: cert({
        projectId: env.FIREBASE_PROJECT_ID,
        clientEmail: env.FIREBASE_CLIENT_EMAIL,
        privateKey: env.FIREBASE_PRIVATE_KEY
      })
    });
  }

  console.warn('[firebase] falling back to application default credentials');
  return initializeApp({
    credential: applicationDefault()
  });
}

export function firebaseClients(env: Env) {
  const app = initFirebase(env);
  return {
    firebaseAuth: getAuth(app),
    firestore: getFirestore(app)
  };
}
