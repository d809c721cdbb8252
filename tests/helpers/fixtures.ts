import { Collection, Document, ObjectId } from 'mongodb';
import { StoredChatThread } from '../../src/models/ChatThread';
import { StoredChatFile } from '../../src/models/ChatFile';
import { ChatMessage, ChatUser } from '../../src/types';

export type MockCollection = Record<string, jest.Mock>;

// Only the methods a test stubs exist on the fake; everything else would throw
export const asCollection = <T extends Document>(fake: MockCollection) => fake as unknown as Collection<T>;

export interface MockCursor {
  sort: jest.Mock;
  toArray: jest.Mock;
}

export const mockCursor = <T>(docs: T[]): MockCursor => {
  const cursor: MockCursor = {
    sort: jest.fn(),
    toArray: jest.fn().mockResolvedValue(docs),
  };
  cursor.sort.mockReturnValue(cursor);
  return cursor;
};

export const THREAD_ID = '64b7f0c2a1b2c3d4e5f60718';
export const FILE_ID = '64b7f0c2a1b2c3d4e5f60719';

export const customer: ChatUser = {
  id: 'user-1',
  subjectId: 'subject-1',
  email: 'jane.doe@example.com',
  name: 'Jane Doe',
  role: 'user',
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
};

export const otherCustomer: ChatUser = {
  id: 'user-2',
  subjectId: 'subject-2',
  email: 'sam@example.com',
  name: 'Sam',
  role: 'user',
  createdAt: new Date('2024-01-02T00:00:00.000Z'),
};

export const admin: ChatUser = {
  id: 'admin-1',
  subjectId: 'subject-admin-1',
  email: 'tailor@example.com',
  name: 'Tailor',
  role: 'admin',
  createdAt: new Date('2024-01-01T00:00:00.000Z'),
};

export const makeMessage = (overrides: Partial<ChatMessage> = {}): ChatMessage => ({
  id: 'message-1',
  senderId: customer.id,
  senderName: customer.name,
  senderRole: 'user',
  content: 'Can the hem be taken up by 2cm?',
  files: [],
  timestamp: new Date('2024-05-01T10:00:00.000Z'),
  isRead: false,
  ...overrides,
});

export const makeThread = (overrides: Partial<StoredChatThread> = {}): StoredChatThread => ({
  _id: new ObjectId(THREAD_ID),
  userId: customer.id,
  userEmail: customer.email,
  userName: customer.name,
  adminId: null,
  messages: [],
  createdAt: new Date('2024-05-01T09:00:00.000Z'),
  updatedAt: new Date('2024-05-01T09:00:00.000Z'),
  ...overrides,
});

export const makeFile = (overrides: Partial<StoredChatFile> = {}): StoredChatFile => ({
  _id: new ObjectId(FILE_ID),
  filename: 'measurements.pdf',
  contentType: 'application/pdf',
  size: 2048,
  storageId: 'chat-files/blob-1.pdf',
  threadId: THREAD_ID,
  uploadedBy: customer.id,
  uploadDate: new Date('2024-05-01T09:30:00.000Z'),
  ...overrides,
});
