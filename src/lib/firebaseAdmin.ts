import admin from 'firebase-admin';
import { config } from './config.js';

export interface VerifiedToken {
  uid: string;
  email?: string;
}

export type TokenVerifier = (token: string) => Promise<VerifiedToken>;

// Initialised on first use so that importing the app never needs credentials
function firebaseApp(): admin.app.App {
  if (!admin.apps.length) {
    admin.initializeApp({
      credential: admin.credential.cert({
        projectId: config.firebase.projectId,
        clientEmail: config.firebase.clientEmail,
        privateKey: config.firebase.privateKey,
      }),
    });
  }
  return admin.app();
}

export const verifyFirebaseToken: TokenVerifier = async (token) => {
  const decoded = await firebaseApp().auth().verifyIdToken(token);
  return { uid: decoded.uid, email: decoded.email };
};
