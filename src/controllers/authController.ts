import { Request, Response } from 'express';
import admin, { isFirebaseConfigured } from '../firebaseAdmin';
import { ChatError, respondWithError } from '../utils/chatErrors';
import { toUserView } from '../utils/chatSerializers';
import { requireIdentity } from './chatController';

const ASSIGNABLE_ROLES = new Set(['user', 'admin']);
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

const isUserNotFound = (error: unknown): boolean =>
  typeof error === 'object' &&
  error !== null &&
  'code' in error &&
  error.code === 'auth/user-not-found';

const requireFirebase = () => {
  if (!isFirebaseConfigured()) {
    throw new ChatError('upstream', 'Firebase Admin is not configured');
  }
};

const findFirebaseUser = async (email: string) => {
  try {
    return await admin.auth().getUserByEmail(email);
  } catch (error) {
    if (isUserNotFound(error)) {
      throw new ChatError('not_found', `No account found for ${email}`);
    }
    throw error;
  }
};

export const authController = {
  // GET /api/auth/me - The identity resolved from the caller's credential
  getMe: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      res.json({ success: true, user: toUserView(identity) });
    } catch (error) {
      respondWithError(res, error, 'Failed to load current user');
    }
  },

  // POST /api/auth/assign-role - Sets the role claim; the local record follows on the user's next request
  assignRole: async (req: Request, res: Response) => {
    try {
      const email: unknown = req.body ? req.body.email : undefined;
      const role: unknown = req.body ? req.body.role : undefined;

      if (typeof email !== 'string' || !EMAIL_PATTERN.test(email)) {
        throw new ChatError('validation', 'A valid email is required');
      }
      if (typeof role !== 'string' || !ASSIGNABLE_ROLES.has(role)) {
        throw new ChatError('validation', 'role must be "user" or "admin"');
      }

      requireFirebase();
      const user = await findFirebaseUser(email);
      await admin.auth().setCustomUserClaims(user.uid, { ...(user.customClaims || {}), role });

      console.log(`🛡️ Role ${role} assigned to ${email}`);
      res.json({ success: true, message: `Success! ${role} role assigned to ${email}` });
    } catch (error) {
      respondWithError(res, error, 'Failed to assign role');
    }
  },

  // GET /api/auth/user-role/:email
  getUserRole: async (req: Request, res: Response) => {
    try {
      requireFirebase();
      const user = await findFirebaseUser(req.params.email);
      const role: unknown = user.customClaims ? user.customClaims.role : undefined;

      res.json({ success: true, role: typeof role === 'string' ? role : 'No role assigned' });
    } catch (error) {
      respondWithError(res, error, 'Failed to read user role');
    }
  },
};
