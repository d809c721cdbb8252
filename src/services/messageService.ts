import { v4 as uuidv4 } from 'uuid';
import { getChatThreadsCollection, StoredChatThread } from '../models/ChatThread';
import { DeliveryNotifier } from '../realtime/deliveryNotifier';
import { ChatMessage, ChatUser, FileRefInput, MessagePage } from '../types';
import { ChatError } from '../utils/chatErrors';
import { parseTimestamp } from '../utils/timestampUtils';
import { resolveAttachments } from './fileReferenceResolver';
import { assertCanMessage, assertThreadAccess } from './threadStore';

export const DEFAULT_PAGE_LIMIT = 30;
export const MAX_PAGE_LIMIT = 200;
export const MAX_CONTENT_LENGTH = 5000;

export interface AppendMessageInput {
  thread: StoredChatThread;
  sender: ChatUser;
  content: unknown;
  fileRefs: FileRefInput[];
}

const nextTimestamp = (thread: StoredChatThread): Date => {
  const now = Date.now();
  const last = thread.messages[thread.messages.length - 1];
  return new Date(last ? Math.max(now, last.timestamp.getTime() + 1) : now);
};

const validateContent = (content: unknown, hasFiles: boolean): string => {
  if (content !== undefined && content !== null && typeof content !== 'string') {
    throw new ChatError('validation', 'content must be a string');
  }
  const text = typeof content === 'string' ? content : '';
  if (text.length > MAX_CONTENT_LENGTH) {
    throw new ChatError('validation', `content cannot exceed ${MAX_CONTENT_LENGTH} characters`);
  }
  if (text.trim().length === 0 && !hasFiles) {
    throw new ChatError('validation', 'Message content or files are required');
  }
  return text;
};

/**
 * Appends a message to the thread and then tries live delivery.
 *
 * The append is a single `$push`, so concurrent appends to one thread never
 * overwrite each other. Delivery runs only after the write succeeded and its
 * failures are logged, not thrown.
 */
export const appendMessage = async (
  notifier: DeliveryNotifier,
  { thread, sender, content, fileRefs }: AppendMessageInput
): Promise<ChatMessage> => {
  await assertCanMessage(thread, sender);
  const text = validateContent(content, fileRefs.length > 0);

  const files = await resolveAttachments(fileRefs, thread._id.toHexString(), sender);
  const message: ChatMessage = {
    id: uuidv4(),
    senderId: sender.id,
    senderName: sender.name,
    senderRole: sender.role,
    content: text,
    files,
    timestamp: nextTimestamp(thread),
    isRead: false,
  };

  const result = await getChatThreadsCollection().updateOne(
    { _id: thread._id },
    {
      $push: { messages: message },
      $set: { updatedAt: message.timestamp },
    }
  );
  if (result.matchedCount === 0) {
    throw new ChatError('not_found', 'Chat thread not found');
  }

  console.log(`💬 ${sender.role} ${sender.id} added message ${message.id} to thread ${thread._id.toHexString()}`);

  try {
    await notifier.notify(thread._id.toHexString(), thread, message);
  } catch (error) {
    console.error(`❌ Live delivery failed for message ${message.id}:`, error);
  }

  return message;
};

/**
 * Flips every unread message the reader did not send. The update is filtered
 * to exactly those array elements, so it cannot clobber a concurrent append.
 * Reading again changes nothing.
 */
export const markReadOnFetch = async (
  thread: StoredChatThread,
  reader: ChatUser
): Promise<{ thread: StoredChatThread; didMutate: boolean }> => {
  assertThreadAccess(thread, reader);

  let flipped = 0;
  const messages = thread.messages.map(message => {
    if (message.isRead || message.senderId === reader.id) {
      return message;
    }
    flipped += 1;
    return { ...message, isRead: true };
  });

  if (flipped === 0) {
    return { thread, didMutate: false };
  }

  await getChatThreadsCollection().updateOne(
    { _id: thread._id },
    { $set: { 'messages.$[unread].isRead': true } },
    { arrayFilters: [{ 'unread.isRead': false, 'unread.senderId': { $ne: reader.id } }] }
  );

  return { thread: { ...thread, messages }, didMutate: true };
};

/** Most recent `limit` messages strictly before `before`, oldest first. */
export const paginateMessages = (messages: ChatMessage[], page: MessagePage): ChatMessage[] => {
  const sorted = [...messages].sort((a, b) => a.timestamp.getTime() - b.timestamp.getTime());
  const before = page.before;
  const filtered = before ? sorted.filter(message => message.timestamp.getTime() < before.getTime()) : sorted;
  return filtered.slice(Math.max(filtered.length - page.limit, 0));
};

const singleQueryValue = (value: unknown): string | undefined => {
  if (Array.isArray(value)) return singleQueryValue(value[0]);
  return typeof value === 'string' && value.length > 0 ? value : undefined;
};

export const parseMessagePage = (query: Record<string, unknown>): MessagePage => {
  const rawLimit = singleQueryValue(query.limit);
  const rawBefore = singleQueryValue(query.before);

  let limit = DEFAULT_PAGE_LIMIT;
  if (rawLimit !== undefined) {
    limit = Number(rawLimit);
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
      throw new ChatError('validation', `limit must be an integer between 1 and ${MAX_PAGE_LIMIT}`);
    }
  }

  if (rawBefore === undefined) {
    return { limit };
  }

  const before = parseTimestamp(rawBefore);
  if (!before) {
    throw new ChatError('validation', `Invalid before timestamp: ${rawBefore}`);
  }
  return { limit, before };
};
