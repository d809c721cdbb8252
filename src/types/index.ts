// Backend type definitions

export type ChatRole = 'user' | 'admin';

export interface ChatUser {
  id: string; // Local user id, referenced by threads and messages
  subjectId: string; // Subject claimed by the verified credential
  email: string;
  name: string;
  role: ChatRole;
  createdAt: Date;
}

/**
 * Claims produced by a credential verifier. Only `subjectId` is guaranteed;
 * the rest is whatever the credential carried.
 */
export interface CredentialClaims {
  subjectId: string;
  email?: string;
  name?: string;
  role?: string;
}

export interface FileAttachmentRef {
  fileId: string;
  filename: string;
  contentType: string;
  size: number;
  storageId: string;
}

export interface ChatMessage {
  id: string;
  senderId: string;
  senderName: string;
  senderRole: ChatRole;
  content: string;
  files: FileAttachmentRef[];
  timestamp: Date;
  isRead: boolean;
}

/** Client-supplied file reference, already validated at the boundary. */
export interface FileRefInput {
  id?: string;
  storageId?: string;
}

export interface MessagePage {
  limit: number;
  before?: Date;
}

declare global {
  namespace Express {
    interface Request {
      identity?: ChatUser;
    }
  }
}
