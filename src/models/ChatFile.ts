import { Collection, Db, ObjectId } from 'mongodb';

export interface IChatFile {
  _id?: ObjectId;
  filename: string;
  contentType: string;
  size: number; // in bytes
  storageId: string; // Blob store handle
  thumbnailId?: string;
  threadId?: string;
  uploadedBy: string;
  uploadDate: Date;
}

export type StoredChatFile = IChatFile & { _id: ObjectId };

let chatFilesCollection: Collection<IChatFile>;

export const initializeChatFileCollection = async (db: Db) => {
  chatFilesCollection = db.collection<IChatFile>('chat_files');

  await Promise.all([
    chatFilesCollection.createIndex({ storageId: 1 }),
    chatFilesCollection.createIndex({ uploadedBy: 1, uploadDate: -1 }),
  ]);
};

export const getChatFilesCollection = (): Collection<IChatFile> => {
  if (!chatFilesCollection) {
    throw new Error('Chat files collection not initialized. Call initializeChatFileCollection first.');
  }
  return chatFilesCollection;
};
