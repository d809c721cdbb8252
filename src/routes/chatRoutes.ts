import express, { RequestHandler } from 'express';
import { ChatController } from '../controllers/chatController';

export const createChatRoutes = (requireAuth: RequestHandler, chatController: ChatController) => {
  const router = express.Router();

  // Apply requireAuth to all routes in this router
  router.use(requireAuth);

  // GET /api/chat/threads - Threads visible to the caller
  router.get('/threads', chatController.getThreads);

  // POST /api/chat/thread - Create (or return) the caller's thread
  router.post('/thread', chatController.createThread);

  // GET /api/chat/thread/:threadId - Paginated thread, marks messages read
  router.get('/thread/:threadId', chatController.getThread);

  // POST /api/chat/thread/:threadId/message - Send a message
  router.post('/thread/:threadId/message', chatController.sendMessage);

  // PUT /api/chat/thread/:threadId/read - Mark the other party's messages read
  router.put('/thread/:threadId/read', chatController.markThreadRead);

  return router;
};
