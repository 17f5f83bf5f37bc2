import admin from 'firebase-admin';
import type { Env } from './env.js';

export function createFirebaseMessaging(env: Pick<Env, 'FIREBASE_PROJECT_ID' | 'FCM_SERVICE_ACCOUNT_JSON'>) {
  if (!admin.apps.length) {
    if (!env.FCM_SERVICE_ACCOUNT_JSON) {
      admin.initializeApp({ projectId: env.FIREBASE_PROJECT_ID });
    } else {
      const serviceAccount: admin.ServiceAccount = JSON.parse(env.FCM_SERVICE_ACCOUNT_JSON);
      admin.initializeApp({
        credential: admin.credential.cert(serviceAccount),
        projectId: env.FIREBASE_PROJECT_ID
      });
    }
  }

  return admin.messaging();
}
