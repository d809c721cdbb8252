import { Collection, Db, ObjectId } from 'mongodb';
import { ChatMessage } from '../types';

export interface IChatThread {
  _id?: ObjectId;
  userId: string;
  userEmail: string;
  userName: string;
  // Never set: threads are shared by every admin rather than assigned to one
  adminId: string | null;
  messages: ChatMessage[];
  createdAt: Date;
  updatedAt: Date;
}

export type StoredChatThread = IChatThread & { _id: ObjectId };

let chatThreadsCollection: Collection<IChatThread>;

export const initializeChatThreadCollection = async (db: Db) => {
  chatThreadsCollection = db.collection<IChatThread>('chat_threads');

  await Promise.all([
    chatThreadsCollection.createIndex({ userId: 1 }, { unique: true }),
    chatThreadsCollection.createIndex({ updatedAt: -1 }),
  ]);
};

export const getChatThreadsCollection = (): Collection<IChatThread> => {
  if (!chatThreadsCollection) {
    throw new Error('Chat threads collection not initialized. Call initializeChatThreadCollection first.');
  }
  return chatThreadsCollection;
};
