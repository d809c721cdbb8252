import express, { RequestHandler } from 'express';
import { createFilesController } from '../controllers/filesController';
import { uploadChatFiles } from '../middleware/uploadMiddleware';

export const createFilesRoutes = (
  requireAuth: RequestHandler,
  filesController: ReturnType<typeof createFilesController>
) => {
  const router = express.Router();

  router.use(requireAuth);

  // POST /api/files/upload - multipart: thread_id + files[]
  router.post('/upload', uploadChatFiles, filesController.uploadFiles);

  router.get('/:fileId', filesController.getFile);

  router.delete('/:fileId', filesController.deleteFile);

  return router;
};
