import { ObjectId } from 'mongodb';
import { getChatThreadsCollection, IChatThread, StoredChatThread } from '../models/ChatThread';
import { getUsersCollection } from '../models/User';
import { ChatUser } from '../types';
import { ChatError, isDuplicateKeyError } from '../utils/chatErrors';

/**
 * Returns the caller's thread, creating it on first contact. Admins never own
 * threads. The upsert plus the unique `userId` index keep concurrent first
 * contacts from producing two threads.
 */
export const getOrCreateThread = async (
  owner: ChatUser
): Promise<{ thread: StoredChatThread; created: boolean }> => {
  if (owner.role === 'admin') {
    throw new ChatError('invalid_role', 'Admins cannot create chat threads');
  }

  const threads = getChatThreadsCollection();
  const existing = await threads.findOne({ userId: owner.id });
  if (existing) {
    return { thread: existing, created: false };
  }

  const now = new Date();
  const fresh: Omit<IChatThread, '_id'> = {
    userId: owner.id,
    userEmail: owner.email,
    userName: owner.name,
    adminId: null,
    messages: [],
    createdAt: now,
    updatedAt: now,
  };

  try {
    const result = await threads.findOneAndUpdate(
      { userId: owner.id },
      { $setOnInsert: fresh },
      { upsert: true, returnDocument: 'after', includeResultMetadata: true }
    );
    if (result.value) {
      const created = result.lastErrorObject?.updatedExisting === false;
      if (created) {
        console.log(`🧵 Created chat thread ${result.value._id.toHexString()} for user ${owner.id}`);
      }
      return { thread: result.value, created };
    }
  } catch (error) {
    // Two upserts raced on the unique index; the loser reads the winner's thread
    if (!isDuplicateKeyError(error)) throw error;
  }

  const winner = await threads.findOne({ userId: owner.id });
  if (!winner) {
    throw new ChatError('upstream', `Chat thread for user ${owner.id} could not be created`);
  }
  return { thread: winner, created: false };
};

/** Admins see every thread, newest activity first; a customer sees only their own. */
export const listThreadsFor = async (identity: ChatUser): Promise<StoredChatThread[]> => {
  const threads = getChatThreadsCollection();

  if (identity.role === 'admin') {
    return threads.find({}).sort({ updatedAt: -1 }).toArray();
  }
  return threads.find({ userId: identity.id }).toArray();
};

export const getThreadById = async (threadId: string): Promise<StoredChatThread> => {
  if (!ObjectId.isValid(threadId)) {
    throw new ChatError('not_found', 'Chat thread not found');
  }

  const thread = await getChatThreadsCollection().findOne({ _id: new ObjectId(threadId) });
  if (!thread) {
    throw new ChatError('not_found', 'Chat thread not found');
  }
  return thread;
};

export const assertThreadAccess = (thread: IChatThread, identity: ChatUser) => {
  if (identity.role !== 'admin' && thread.userId !== identity.id) {
    throw new ChatError('forbidden', 'Not authorized to access this chat thread');
  }
};

/**
 * Access check for writing to a thread: on top of the read rule, an admin
 * may not message a thread whose owner is itself an admin.
 */
export const assertCanMessage = async (thread: IChatThread, sender: ChatUser) => {
  assertThreadAccess(thread, sender);

  if (sender.role === 'admin') {
    const owner = await getUsersCollection().findOne({ id: thread.userId });
    if (owner && owner.role === 'admin') {
      throw new ChatError('forbidden', 'Admins cannot send messages to other admins');
    }
  }
};
