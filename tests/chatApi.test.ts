import express from 'express';
import request from 'supertest';
import { ObjectId } from 'mongodb';
import { createApp, handleMiddlewareError } from '../src/app';
import { getChatThreadsCollection, IChatThread } from '../src/models/ChatThread';
import { getChatFilesCollection, IChatFile } from '../src/models/ChatFile';
import { getUsersCollection, IUser } from '../src/models/User';
import { ConnectionRegistry } from '../src/realtime/connectionRegistry';
import { DeliveryNotifier } from '../src/realtime/deliveryNotifier';
import { GatewayRelay } from '../src/realtime/gatewayRelay';
import { ChatUser } from '../src/types';
import { ChatError } from '../src/utils/chatErrors';
import {
  admin,
  asCollection,
  customer,
  FILE_ID,
  makeFile,
  makeMessage,
  makeThread,
  mockCursor,
  MockCollection,
  otherCustomer,
  THREAD_ID,
} from './helpers/fixtures';

jest.mock('../src/models/ChatThread', () => ({
  getChatThreadsCollection: jest.fn(),
}));
jest.mock('../src/models/ChatFile', () => ({
  getChatFilesCollection: jest.fn(),
}));
jest.mock('../src/models/User', () => ({
  getUsersCollection: jest.fn(),
}));

const identities = new Map<string, ChatUser>([
  ['customer-token', customer],
  ['other-token', otherCustomer],
  ['admin-token', admin],
]);

const resolveIdentity = async (credential: string): Promise<ChatUser> => {
  const identity = identities.get(credential);
  if (!identity) {
    throw new ChatError('unauthenticated', 'Invalid authentication credentials');
  }
  return identity;
};

const bearer = (token: string) => ({ Authorization: `Bearer ${token}` });

let threads: MockCollection;
let files: MockCollection;
let users: MockCollection;
let registry: ConnectionRegistry;
let blobStore: { put: jest.Mock; get: jest.Mock; delete: jest.Mock };
let app: ReturnType<typeof createApp>;

beforeEach(() => {
  jest.clearAllMocks();
  threads = {
    find: jest.fn(),
    findOne: jest.fn().mockResolvedValue(null),
    findOneAndUpdate: jest.fn(),
    updateOne: jest.fn().mockResolvedValue({ matchedCount: 1, modifiedCount: 1 }),
  };
  files = {
    findOne: jest.fn().mockResolvedValue(null),
    insertOne: jest.fn().mockResolvedValue({ insertedId: new ObjectId(FILE_ID) }),
    deleteOne: jest.fn().mockResolvedValue({ deletedCount: 1 }),
  };
  users = { findOne: jest.fn().mockResolvedValue(null) };
  jest.mocked(getChatThreadsCollection).mockReturnValue(asCollection<IChatThread>(threads));
  jest.mocked(getChatFilesCollection).mockReturnValue(asCollection<IChatFile>(files));
  jest.mocked(getUsersCollection).mockReturnValue(asCollection<IUser>(users));

  registry = new ConnectionRegistry();
  blobStore = { put: jest.fn(), get: jest.fn(), delete: jest.fn() };
  app = createApp({
    resolveIdentity,
    registry,
    notifier: new DeliveryNotifier(registry, new GatewayRelay()),
    blobStore,
    healthCheck: async () => true,
  });
});

describe('authentication', () => {
  test('requests without a credential are refused', async () => {
    const response = await request(app).get('/api/chat/threads');

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: 'Authentication required',
      message: 'Please provide a valid authorization token',
    });
  });

  test('a non-Bearer header is called out', async () => {
    const response = await request(app).get('/api/chat/threads').set('Authorization', 'Token abc');

    expect(response.status).toBe(401);
    expect(response.body.message).toBe('Invalid authorization header format');
  });

  test('a credential nobody accepts is refused', async () => {
    const response = await request(app).get('/api/chat/threads').set(bearer('expired-token'));

    expect(response.status).toBe(401);
    expect(response.body).toEqual({
      success: false,
      error: 'Invalid token',
      message: 'Invalid authentication credentials',
    });
  });

  test('the accessToken cookie is accepted as a fallback', async () => {
    const response = await request(app).get('/api/auth/me').set('Cookie', 'accessToken=customer-token');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      success: true,
      user: { id: 'user-1', email: 'jane.doe@example.com', name: 'Jane Doe', role: 'user' },
    });
  });
});

describe('chat threads', () => {
  test('a customer lists their own thread', async () => {
    threads.find.mockReturnValue(mockCursor([makeThread()]));

    const response = await request(app).get('/api/chat/threads').set(bearer('customer-token'));

    expect(response.status).toBe(200);
    expect(response.body.success).toBe(true);
    expect(response.body.threads.map((thread: { id: string }) => thread.id)).toEqual([THREAD_ID]);
    expect(threads.find).toHaveBeenCalledWith({ userId: 'user-1' });
  });

  test('admins cannot open threads', async () => {
    const response = await request(app).post('/api/chat/thread').set(bearer('admin-token'));

    expect(response.status).toBe(400);
    expect(response.body).toEqual({
      success: false,
      error: 'Invalid role',
      message: 'Admins cannot create chat threads',
    });
  });

  test('opening a thread twice returns the existing one', async () => {
    threads.findOne.mockResolvedValue(makeThread());

    const response = await request(app).post('/api/chat/thread').set(bearer('customer-token'));

    expect(response.status).toBe(200);
    expect(response.body.thread).toMatchObject({ id: THREAD_ID, user_id: 'user-1', messages: [] });
    expect(threads.findOneAndUpdate).not.toHaveBeenCalled();
  });

  test('a first thread answers 201', async () => {
    threads.findOneAndUpdate.mockResolvedValue({ value: makeThread(), lastErrorObject: { updatedExisting: false } });

    const response = await request(app).post('/api/chat/thread').set(bearer('customer-token'));

    expect(response.status).toBe(201);
    expect(response.body.thread.id).toBe(THREAD_ID);
  });

  test('fetching a thread pages it and marks the other side read', async () => {
    threads.findOne.mockResolvedValue(makeThread({
      messages: [
        makeMessage({ id: 'm1', timestamp: new Date('2024-05-01T10:00:00.000Z') }),
        makeMessage({
          id: 'm2',
          senderId: admin.id,
          senderName: admin.name,
          senderRole: 'admin',
          timestamp: new Date('2024-05-01T10:05:00.000Z'),
        }),
      ],
    }));

    const response = await request(app)
      .get(`/api/chat/thread/${THREAD_ID}?limit=1`)
      .set(bearer('customer-token'));

    expect(response.status).toBe(200);
    expect(response.body.thread.messages).toHaveLength(1);
    expect(response.body.thread.messages[0]).toMatchObject({ id: 'm2', sender_role: 'admin', is_read: true });
    expect(threads.updateOne).toHaveBeenCalledTimes(1);
  });

  test('another customer cannot read the thread', async () => {
    threads.findOne.mockResolvedValue(makeThread());

    const response = await request(app).get(`/api/chat/thread/${THREAD_ID}`).set(bearer('other-token'));

    expect(response.status).toBe(403);
    expect(response.body).toEqual({
      success: false,
      error: 'Access denied',
      message: 'Not authorized to access this chat thread',
    });
  });

  test('an out-of-range page size is a validation error', async () => {
    const response = await request(app).get(`/api/chat/thread/${THREAD_ID}?limit=0`).set(bearer('customer-token'));

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('limit must be an integer between 1 and 200');
  });

  test('an unknown thread is a 404', async () => {
    const response = await request(app).get(`/api/chat/thread/${THREAD_ID}`).set(bearer('customer-token'));

    expect(response.status).toBe(404);
    expect(response.body.message).toBe('Chat thread not found');
  });

  test('the explicit read endpoint reports whether anything changed', async () => {
    threads.findOne.mockResolvedValue(makeThread({ messages: [makeMessage({ senderId: admin.id, senderRole: 'admin' })] }));

    const response = await request(app).put(`/api/chat/thread/${THREAD_ID}/read`).set(bearer('customer-token'));

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ success: true, thread_id: THREAD_ID, updated: true });
  });
});

describe('sending messages', () => {
  test('a customer message is stored unread and pushed to connected admins', async () => {
    threads.findOne.mockResolvedValue(makeThread());
    const adminChannel = { id: 'socket-a1', send: jest.fn(), close: jest.fn() };
    registry.register(adminChannel, 'admin-1', true);

    const response = await request(app)
      .post(`/api/chat/thread/${THREAD_ID}/message`)
      .set(bearer('customer-token'))
      .send({ content: 'Is my suit ready?' });

    expect(response.status).toBe(201);
    expect(response.body).toMatchObject({
      success: true,
      status: 'Message added successfully',
      thread_id: THREAD_ID,
      message: {
        sender_id: 'user-1',
        sender_role: 'user',
        content: 'Is my suit ready?',
        files: [],
        is_read: false,
      },
    });
    expect(adminChannel.send).toHaveBeenCalledWith(expect.objectContaining({
      type: 'new_message',
      thread_id: THREAD_ID,
      message: response.body.message,
    }));
  });

  test('files must be sent as an array', async () => {
    const response = await request(app)
      .post(`/api/chat/thread/${THREAD_ID}/message`)
      .set(bearer('customer-token'))
      .send({ content: 'See attached', files: 'measurements.pdf' });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('files must be an array');
  });

  test('an admin cannot message another admin', async () => {
    threads.findOne.mockResolvedValue(makeThread({ userId: 'admin-2' }));
    users.findOne.mockResolvedValue({ ...admin, id: 'admin-2' });

    const response = await request(app)
      .post(`/api/chat/thread/${THREAD_ID}/message`)
      .set(bearer('admin-token'))
      .send({ content: 'Hello colleague' });

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('Admins cannot send messages to other admins');
  });
});

describe('request body errors', () => {
  test('malformed JSON is a bad request with a JSON body', async () => {
    const response = await request(app)
      .post(`/api/chat/thread/${THREAD_ID}/message`)
      .set(bearer('customer-token'))
      .set('Content-Type', 'application/json')
      .send('{"content": "hi"');

    expect(response.status).toBe(400);
    expect(response.headers['content-type']).toMatch(/^application\/json/);
    expect(response.body).toEqual({
      success: false,
      error: 'Invalid request',
      message: 'Request body is not valid JSON',
    });
    expect(threads.updateOne).not.toHaveBeenCalled();
  });

  test('an oversized body is refused with 413', async () => {
    const response = await request(app)
      .post(`/api/chat/thread/${THREAD_ID}/message`)
      .set(bearer('customer-token'))
      .send({ content: 'x'.repeat(2 * 1024 * 1024) });

    expect(response.status).toBe(413);
    expect(response.body).toEqual({
      success: false,
      error: 'Invalid request',
      message: 'Request body is too large',
    });
  });

  test('any other middleware failure is a logged 500', async () => {
    const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const failing = express();
    failing.get('/boom', () => {
      throw new Error('disk on fire');
    });
    failing.use(handleMiddlewareError);

    const response = await request(failing).get('/boom');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({
      success: false,
      error: 'Server error',
      message: 'Internal server error',
    });
    expect(errorLog).toHaveBeenCalled();
    errorLog.mockRestore();
  });
});

describe('files', () => {
  test('uploads are stored and described', async () => {
    threads.findOne.mockResolvedValue(makeThread());
    blobStore.put.mockResolvedValue('chat-files/new.txt');

    const response = await request(app)
      .post('/api/files/upload')
      .set(bearer('customer-token'))
      .field('thread_id', THREAD_ID)
      .attach('files', Buffer.from('hello'), 'note.txt');

    expect(response.status).toBe(201);
    expect(response.body.files).toEqual([expect.objectContaining({
      id: FILE_ID,
      filename: 'note.txt',
      size: 5,
      storage_id: 'chat-files/new.txt',
      thread_id: THREAD_ID,
      uploaded_by: 'user-1',
    })]);
    expect(blobStore.put).toHaveBeenCalledWith(expect.any(Buffer), 'note.txt', expect.any(String));
  });

  test('a failed upload removes what was already written', async () => {
    const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    threads.findOne.mockResolvedValue(makeThread());
    blobStore.put
      .mockResolvedValueOnce('chat-files/first.txt')
      .mockResolvedValueOnce('chat-files/second.txt');
    blobStore.delete.mockResolvedValue(true);
    files.insertOne
      .mockResolvedValueOnce({ insertedId: new ObjectId(FILE_ID) })
      .mockRejectedValueOnce(new Error('write concern timeout'));

    const response = await request(app)
      .post('/api/files/upload')
      .set(bearer('customer-token'))
      .field('thread_id', THREAD_ID)
      .attach('files', Buffer.from('one'), 'first.txt')
      .attach('files', Buffer.from('two'), 'second.txt');

    expect(response.status).toBe(500);
    expect(response.body).toEqual({ success: false, error: 'Server error', message: 'Failed to upload files' });
    expect(blobStore.delete).toHaveBeenCalledWith('chat-files/first.txt');
    expect(blobStore.delete).toHaveBeenCalledWith('chat-files/second.txt');
    expect(files.deleteOne).toHaveBeenCalledWith({ _id: new ObjectId(FILE_ID) });
    errorLog.mockRestore();
  });

  test('an upload needs a thread', async () => {
    const response = await request(app)
      .post('/api/files/upload')
      .set(bearer('customer-token'))
      .attach('files', Buffer.from('hello'), 'note.txt');

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('thread_id is required');
  });

  test('the uploader can download the bytes', async () => {
    files.findOne.mockResolvedValue(makeFile({ filename: 'notes.txt', contentType: 'text/plain' }));
    blobStore.get.mockResolvedValue({ data: Buffer.from('chest 102cm'), contentType: 'text/plain' });

    const response = await request(app).get(`/api/files/${FILE_ID}`).set(bearer('customer-token'));

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/^text\/plain/);
    expect(response.headers['content-disposition']).toBe('attachment; filename="notes.txt"');
    expect(response.text).toBe('chest 102cm');
  });

  test('a customer outside the thread cannot download', async () => {
    files.findOne.mockResolvedValue(makeFile());
    threads.findOne.mockResolvedValue(makeThread());

    const response = await request(app).get(`/api/files/${FILE_ID}`).set(bearer('other-token'));

    expect(response.status).toBe(403);
    expect(response.body.message).toBe('Not authorized to access this file');
    expect(blobStore.get).not.toHaveBeenCalled();
  });

  test('only the uploader or an admin can delete', async () => {
    files.findOne.mockResolvedValue(makeFile());
    blobStore.delete.mockResolvedValue(true);

    const refused = await request(app).delete(`/api/files/${FILE_ID}`).set(bearer('other-token'));
    const allowed = await request(app).delete(`/api/files/${FILE_ID}`).set(bearer('admin-token'));

    expect(refused.status).toBe(403);
    expect(refused.body.message).toBe('Not authorized to delete this file');
    expect(allowed.status).toBe(200);
    expect(allowed.body).toEqual({ success: true, message: 'File deleted successfully' });
    expect(blobStore.delete).toHaveBeenCalledTimes(1);
  });
});

describe('role administration', () => {
  test('is closed to customers', async () => {
    const response = await request(app)
      .post('/api/auth/assign-role')
      .set(bearer('customer-token'))
      .send({ email: 'sam@example.com', role: 'admin' });

    expect(response.status).toBe(403);
    expect(response.body).toEqual({
      success: false,
      error: 'Admin access required',
      message: 'You need admin privileges to access this resource',
    });
  });

  test('validates the requested role', async () => {
    const response = await request(app)
      .post('/api/auth/assign-role')
      .set(bearer('admin-token'))
      .send({ email: 'sam@example.com', role: 'owner' });

    expect(response.status).toBe(400);
    expect(response.body.message).toBe('role must be "user" or "admin"');
  });
});

describe('health', () => {
  test('reports the database and live connection counts', async () => {
    registry.register({ id: 'socket-a1', send: jest.fn(), close: jest.fn() }, 'admin-1', true);

    const response = await request(app).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toEqual({
      status: 'ok',
      database: true,
      connections: 1,
      adminConnections: 1,
      timestamp: expect.any(String),
    });
  });

  test('unknown routes answer 404', async () => {
    const response = await request(app).get('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(response.body.success).toBe(false);
  });
});
