import { Request, Response } from 'express';
import { ObjectId } from 'mongodb';
import { getChatFilesCollection, IChatFile, StoredChatFile } from '../models/ChatFile';
import { getChatThreadsCollection } from '../models/ChatThread';
import { BlobStore } from '../services/blobStore';
import { assertThreadAccess, getThreadById } from '../services/threadStore';
import { ChatUser } from '../types';
import { ChatError, respondWithError } from '../utils/chatErrors';
import { toChatFileView } from '../utils/chatSerializers';
import { MAX_UPLOAD_FILE_SIZE_BYTES } from '../middleware/uploadMiddleware';
import { requireIdentity } from './chatController';

export interface FilesControllerDeps {
  blobStore: BlobStore;
}

const findFile = async (fileId: string): Promise<StoredChatFile> => {
  if (!ObjectId.isValid(fileId)) {
    throw new ChatError('not_found', 'File not found');
  }
  const file = await getChatFilesCollection().findOne({ _id: new ObjectId(fileId) });
  if (!file) {
    throw new ChatError('not_found', 'File not found');
  }
  return file;
};

/** Uploader, any admin, or the owner of the thread the file was uploaded to. */
const canReadFile = async (file: IChatFile, identity: ChatUser): Promise<boolean> => {
  if (identity.role === 'admin' || file.uploadedBy === identity.id) {
    return true;
  }
  if (!file.threadId || !ObjectId.isValid(file.threadId)) {
    return false;
  }
  const thread = await getChatThreadsCollection().findOne(
    { _id: new ObjectId(file.threadId) },
    { projection: { userId: 1 } }
  );
  return Boolean(thread && thread.userId === identity.id);
};

const uploadedFiles = (req: Request): Express.Multer.File[] => (Array.isArray(req.files) ? req.files : []);

const contentDisposition = (filename: string) =>
  `attachment; filename="${filename.replace(/["\\\r\n]/g, '_')}"`;

// An upload is all-or-nothing: whatever was written before a failure is removed again
const discardPartialUpload = async (blobStore: BlobStore, handles: string[], records: StoredChatFile[]) => {
  const results = await Promise.allSettled([
    ...handles.map(handle => blobStore.delete(handle)),
    ...records.map(record => getChatFilesCollection().deleteOne({ _id: record._id })),
  ]);
  const failed = results.filter(result => result.status === 'rejected').length;
  if (failed > 0) {
    console.warn(`⚠️ Could not clean up ${failed} item(s) after a failed upload`);
    return;
  }
  console.log(`🧹 Discarded ${handles.length} blob(s) from a failed upload`);
};

export const createFilesController = ({ blobStore }: FilesControllerDeps) => ({
  // POST /api/files/upload - Store attachments for a thread before they are referenced by a message
  uploadFiles: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const threadId: unknown = req.body ? req.body.thread_id : undefined;
      if (typeof threadId !== 'string' || threadId.length === 0) {
        throw new ChatError('validation', 'thread_id is required');
      }

      const files = uploadedFiles(req);
      if (files.length === 0) {
        throw new ChatError('validation', 'No files uploaded');
      }
      const oversized = files.find(file => file.size > MAX_UPLOAD_FILE_SIZE_BYTES);
      if (oversized) {
        throw new ChatError('validation', `File ${oversized.originalname} exceeds maximum size of 10MB`);
      }

      const thread = await getThreadById(threadId);
      assertThreadAccess(thread, identity);

      const stored: StoredChatFile[] = [];
      const writtenBlobs: string[] = [];
      try {
        for (const file of files) {
          const storageId = await blobStore.put(file.buffer, file.originalname, file.mimetype);
          writtenBlobs.push(storageId);
          const metadata: IChatFile = {
            filename: file.originalname,
            contentType: file.mimetype,
            size: file.size,
            storageId,
            threadId: thread._id.toHexString(),
            uploadedBy: identity.id,
            uploadDate: new Date(),
          };
          const result = await getChatFilesCollection().insertOne(metadata);
          stored.push({ ...metadata, _id: result.insertedId });
        }
      } catch (error) {
        await discardPartialUpload(blobStore, writtenBlobs, stored);
        throw error;
      }

      console.log(`📎 User ${identity.id} uploaded ${stored.length} file(s) to thread ${threadId}`);
      res.status(201).json({
        success: true,
        files: stored.map(toChatFileView),
      });
    } catch (error) {
      respondWithError(res, error, 'Failed to upload files');
    }
  },

  // GET /api/files/:fileId - Download the stored bytes
  getFile: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const file = await findFile(req.params.fileId);

      if (!(await canReadFile(file, identity))) {
        throw new ChatError('forbidden', 'Not authorized to access this file');
      }

      const blob = await blobStore.get(file.storageId).catch((error: unknown) => {
        console.error(`❌ Error retrieving blob ${file.storageId}:`, error);
        throw new ChatError('upstream', 'Error retrieving file');
      });

      res.setHeader('Content-Type', file.contentType || blob.contentType);
      res.setHeader('Content-Disposition', contentDisposition(file.filename));
      res.send(blob.data);
    } catch (error) {
      respondWithError(res, error, 'Error retrieving file');
    }
  },

  // DELETE /api/files/:fileId - Only the uploader or an admin
  deleteFile: async (req: Request, res: Response) => {
    try {
      const identity = requireIdentity(req);
      const file = await findFile(req.params.fileId);

      if (identity.role !== 'admin' && file.uploadedBy !== identity.id) {
        throw new ChatError('forbidden', 'Not authorized to delete this file');
      }

      const removed = await blobStore.delete(file.storageId);
      if (!removed) {
        throw new ChatError('upstream', 'Error deleting file from storage');
      }

      const result = await getChatFilesCollection().deleteOne({ _id: file._id });
      if (result.deletedCount === 0) {
        throw new ChatError('not_found', 'File metadata not found');
      }

      res.json({ success: true, message: 'File deleted successfully' });
    } catch (error) {
      respondWithError(res, error, 'Failed to delete file');
    }
  },
});
