import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { MAX_FILES_PER_MESSAGE } from '../services/fileReferenceResolver';

export const MAX_UPLOAD_FILE_SIZE_BYTES = 10 * 1024 * 1024; // 10 MB per file

const upload = multer({
  storage: multer.memoryStorage(),
  limits: {
    fileSize: MAX_UPLOAD_FILE_SIZE_BYTES,
    files: MAX_FILES_PER_MESSAGE,
  },
});

const describeMulterError = (error: multer.MulterError): string => {
  switch (error.code) {
    case 'LIMIT_FILE_SIZE':
      return 'Each file must be at most 10MB';
    case 'LIMIT_FILE_COUNT':
    case 'LIMIT_UNEXPECTED_FILE':
      return `Maximum ${MAX_FILES_PER_MESSAGE} files can be uploaded per message`;
    default:
      return error.message;
  }
};

// Parses the `files` multipart field, answering 400 when a limit is hit
export const uploadChatFiles = (req: Request, res: Response, next: NextFunction) => {
  upload.array('files', MAX_FILES_PER_MESSAGE)(req, res, (error: unknown) => {
    if (error instanceof multer.MulterError) {
      return res.status(400).json({
        success: false,
        error: 'Invalid upload',
        message: describeMulterError(error),
      });
    }
    if (error) {
      return next(error);
    }
    next();
  });
};
