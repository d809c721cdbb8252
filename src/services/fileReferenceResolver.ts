import { ObjectId } from 'mongodb';
import { getChatFilesCollection, StoredChatFile } from '../models/ChatFile';
import { ChatUser, FileAttachmentRef, FileRefInput } from '../types';
import { ChatError } from '../utils/chatErrors';

export const MAX_FILES_PER_MESSAGE = 10;

const optionalId = (value: unknown): string | undefined =>
  typeof value === 'string' && value.trim().length > 0 ? value.trim() : undefined;

/**
 * Validates the `files` field of a message body. Each entry must be an
 * object; `_id` (or `id`) and `storage_id` are the only keys read.
 */
export const parseFileRefs = (raw: unknown): FileRefInput[] => {
  if (raw === undefined || raw === null) return [];
  if (!Array.isArray(raw)) {
    throw new ChatError('validation', 'files must be an array');
  }
  if (raw.length > MAX_FILES_PER_MESSAGE) {
    throw new ChatError('validation', `Maximum ${MAX_FILES_PER_MESSAGE} files can be attached per message`);
  }

  return raw.map((entry: unknown) => {
    if (typeof entry !== 'object' || entry === null || Array.isArray(entry)) {
      throw new ChatError('validation', 'Each file reference must be an object');
    }
    const fields = new Map(Object.entries(entry));
    return {
      id: optionalId(fields.get('_id')) || optionalId(fields.get('id')),
      storageId: optionalId(fields.get('storage_id')),
    };
  });
};

/**
 * Looks a reference up by id first, then by storage handle. A reference that
 * matches nothing resolves to null instead of failing.
 */
export const resolveFileRef = async (ref: FileRefInput): Promise<StoredChatFile | null> => {
  const files = getChatFilesCollection();

  if (ref.id) {
    return ObjectId.isValid(ref.id) ? files.findOne({ _id: new ObjectId(ref.id) }) : null;
  }
  if (ref.storageId) {
    return files.findOne({ storageId: ref.storageId });
  }
  return null;
};

export const toAttachmentRef = (file: StoredChatFile): FileAttachmentRef => ({
  fileId: file._id.toHexString(),
  filename: file.filename,
  contentType: file.contentType,
  size: file.size,
  storageId: file.storageId,
});

// A file belongs to the message when it was uploaded to this thread or by the sender; admins may attach any file
export const canAttachFile = (file: StoredChatFile, threadId: string, sender: ChatUser): boolean =>
  sender.role === 'admin' || file.threadId === threadId || file.uploadedBy === sender.id;

/**
 * Resolves every reference and keeps the ones that matched, in input order.
 * A file the sender may not attach counts as unresolved.
 */
export const resolveAttachments = async (
  refs: FileRefInput[],
  threadId: string,
  sender: ChatUser
): Promise<FileAttachmentRef[]> => {
  const resolved = await Promise.all(refs.map(resolveFileRef));
  const attachments: FileAttachmentRef[] = [];

  resolved.forEach((file, index) => {
    if (file && canAttachFile(file, threadId, sender)) {
      attachments.push(toAttachmentRef(file));
    } else {
      console.warn('⚠️ Skipping unresolved file reference:', refs[index]);
    }
  });

  return attachments;
};
