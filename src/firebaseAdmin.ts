import admin from 'firebase-admin';
import dotenv from 'dotenv';

dotenv.config();

interface FirebaseServiceAccount {
  projectId: string;
  clientEmail: string;
  privateKey: string;
}

const readServiceAccount = (): FirebaseServiceAccount | null => {
  const { FIREBASE_PROJECT_ID, FIREBASE_CLIENT_EMAIL, FIREBASE_PRIVATE_KEY } = process.env;
  if (!FIREBASE_PROJECT_ID || !FIREBASE_CLIENT_EMAIL || !FIREBASE_PRIVATE_KEY) {
    return null;
  }
  return {
    projectId: FIREBASE_PROJECT_ID,
    clientEmail: FIREBASE_CLIENT_EMAIL,
    // Keys pasted into .env keep their newlines escaped
    privateKey: FIREBASE_PRIVATE_KEY.replace(/\\n/g, "\n"),
  };
};

/**
 * Firebase is one credential source among several: without a service account
 * the Firebase verifier and the role endpoints are simply unavailable.
 */
const initializeFirebaseAdmin = () => {
  if (admin.apps.length) return;

  const serviceAccount = readServiceAccount();
  if (!serviceAccount) {
    console.warn("⚠️ Firebase Admin not initialized: missing service account env vars. Firebase tokens will be rejected.");
    return;
  }

  try {
    admin.initializeApp({ credential: admin.credential.cert(serviceAccount) });
    console.log(`✅ Firebase Admin initialized for project ${serviceAccount.projectId}`);
  } catch (error) {
    console.error("❌ Firebase Admin initialization failed:", error);
  }
};

const isTestRuntime = process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined;
if (!isTestRuntime) {
  initializeFirebaseAdmin();
}

export const isFirebaseConfigured = (): boolean => admin.apps.length > 0;

export default admin;
