import { ChatMessage, ChatUser, FileAttachmentRef } from '../types';
import { IChatThread } from '../models/ChatThread';
import { IChatFile } from '../models/ChatFile';

// Wire shapes keep the snake_case field names the chat clients were built against.

export interface FileAttachmentView {
  file_id: string;
  filename: string;
  content_type: string;
  size: number;
  storage_id: string;
}

export interface MessageView {
  id: string;
  sender_id: string;
  sender_name: string;
  sender_role: string;
  content: string;
  files: FileAttachmentView[];
  timestamp: string;
  is_read: boolean;
}

export interface ThreadView {
  id: string;
  user_id: string;
  user_email: string;
  user_name: string;
  admin_id: string | null;
  messages: MessageView[];
  created_at: string;
  updated_at: string;
}

export interface ChatFileView {
  id: string;
  filename: string;
  content_type: string;
  size: number;
  storage_id: string;
  thumbnail_id: string | null;
  thread_id: string | null;
  uploaded_by: string;
  upload_date: string;
}

export const toAttachmentView = (file: FileAttachmentRef): FileAttachmentView => ({
  file_id: file.fileId,
  filename: file.filename,
  content_type: file.contentType,
  size: file.size,
  storage_id: file.storageId,
});

export const toMessageView = (message: ChatMessage): MessageView => ({
  id: message.id,
  sender_id: message.senderId,
  sender_name: message.senderName,
  sender_role: message.senderRole,
  content: message.content,
  files: (message.files || []).map(toAttachmentView),
  timestamp: message.timestamp.toISOString(),
  is_read: message.isRead,
});

/**
 * @param messages Overrides the stored message list, e.g. with a paginated slice.
 */
export const toThreadView = (thread: IChatThread, messages: ChatMessage[] = thread.messages): ThreadView => ({
  id: thread._id ? thread._id.toHexString() : '',
  user_id: thread.userId,
  user_email: thread.userEmail,
  user_name: thread.userName,
  admin_id: thread.adminId,
  messages: messages.map(toMessageView),
  created_at: thread.createdAt.toISOString(),
  updated_at: thread.updatedAt.toISOString(),
});

export const toChatFileView = (file: IChatFile): ChatFileView => ({
  id: file._id ? file._id.toHexString() : '',
  filename: file.filename,
  content_type: file.contentType,
  size: file.size,
  storage_id: file.storageId,
  thumbnail_id: file.thumbnailId || null,
  thread_id: file.threadId || null,
  uploaded_by: file.uploadedBy,
  upload_date: file.uploadDate.toISOString(),
});

export const toUserView = (user: ChatUser) => ({
  id: user.id,
  email: user.email,
  name: user.name,
  role: user.role,
});
