import express, { RequestHandler } from 'express';
import { authController } from '../controllers/authController';
import { requireAdmin } from '../middleware/authMiddleware';

export const createAuthRoutes = (requireAuth: RequestHandler) => {
  const router = express.Router();

  router.use(requireAuth);

  // GET /api/auth/me - Current identity
  router.get('/me', authController.getMe);

  // POST /api/auth/assign-role - Admin only
  router.post('/assign-role', requireAdmin, authController.assignRole);

  // GET /api/auth/user-role/:email - Admin only
  router.get('/user-role/:email', requireAdmin, authController.getUserRole);

  return router;
};
