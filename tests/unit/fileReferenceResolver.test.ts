import { ObjectId } from 'mongodb';
import { getChatFilesCollection, IChatFile } from '../../src/models/ChatFile';
import {
  canAttachFile,
  parseFileRefs,
  resolveAttachments,
  resolveFileRef,
} from '../../src/services/fileReferenceResolver';
import {
  admin,
  asCollection,
  customer,
  FILE_ID,
  makeFile,
  MockCollection,
  otherCustomer,
  THREAD_ID,
} from '../helpers/fixtures';

jest.mock('../../src/models/ChatFile', () => ({
  getChatFilesCollection: jest.fn(),
}));

let files: MockCollection;

beforeEach(() => {
  jest.clearAllMocks();
  files = { findOne: jest.fn().mockResolvedValue(null) };
  jest.mocked(getChatFilesCollection).mockReturnValue(asCollection<IChatFile>(files));
});

describe('parseFileRefs', () => {
  test('treats a missing field as no attachments', () => {
    expect(parseFileRefs(undefined)).toEqual([]);
    expect(parseFileRefs(null)).toEqual([]);
  });

  test('reads _id, id and storage_id', () => {
    expect(parseFileRefs([
      { _id: FILE_ID, filename: 'ignored.pdf' },
      { id: ' abc ' },
      { storage_id: 'chat-files/blob-2.png' },
      {},
    ])).toEqual([
      { id: FILE_ID, storageId: undefined },
      { id: 'abc', storageId: undefined },
      { id: undefined, storageId: 'chat-files/blob-2.png' },
      { id: undefined, storageId: undefined },
    ]);
  });

  test('rejects anything but an array of objects', () => {
    expect(() => parseFileRefs('file-1')).toThrow('files must be an array');
    expect(() => parseFileRefs(['file-1'])).toThrow('Each file reference must be an object');
    expect(() => parseFileRefs([[FILE_ID]])).toThrow('Each file reference must be an object');
  });

  test('caps a message at ten attachments', () => {
    const eleven = Array.from({ length: 11 }, () => ({ storage_id: 'x' }));

    expect(() => parseFileRefs(eleven)).toThrow('Maximum 10 files can be attached per message');
    expect(parseFileRefs(eleven.slice(1))).toHaveLength(10);
  });
});

describe('resolveFileRef', () => {
  test('looks up by id before storage handle', async () => {
    const file = makeFile();
    files.findOne.mockResolvedValue(file);

    await expect(resolveFileRef({ id: FILE_ID, storageId: 'chat-files/other.png' })).resolves.toBe(file);
    expect(files.findOne).toHaveBeenCalledWith({ _id: new ObjectId(FILE_ID) });
  });

  test('falls back to the storage handle', async () => {
    await resolveFileRef({ storageId: 'chat-files/blob-1.pdf' });

    expect(files.findOne).toHaveBeenCalledWith({ storageId: 'chat-files/blob-1.pdf' });
  });

  test('resolves malformed ids and empty references to null without a query', async () => {
    await expect(resolveFileRef({ id: 'not-an-id' })).resolves.toBeNull();
    await expect(resolveFileRef({})).resolves.toBeNull();
    expect(files.findOne).not.toHaveBeenCalled();
  });
});

describe('attachment scope', () => {
  const otherThreadId = '64b7f0c2a1b2c3d4e5f60720';
  const foreignFile = makeFile({ threadId: otherThreadId, uploadedBy: otherCustomer.id });

  test('a file uploaded to the thread or by the sender can be attached', () => {
    expect(canAttachFile(makeFile(), THREAD_ID, otherCustomer)).toBe(true);
    expect(canAttachFile(makeFile({ threadId: otherThreadId }), THREAD_ID, customer)).toBe(true);
  });

  test("another customer's file from another thread cannot", () => {
    expect(canAttachFile(foreignFile, THREAD_ID, customer)).toBe(false);
    expect(canAttachFile(foreignFile, THREAD_ID, admin)).toBe(true);
  });

  test('resolveAttachments drops files the sender may not attach', async () => {
    files.findOne.mockResolvedValue(foreignFile);

    await expect(resolveAttachments([{ id: FILE_ID }], THREAD_ID, customer)).resolves.toEqual([]);
    await expect(resolveAttachments([{ id: FILE_ID }], THREAD_ID, admin)).resolves.toEqual([{
      fileId: FILE_ID,
      filename: 'measurements.pdf',
      contentType: 'application/pdf',
      size: 2048,
      storageId: 'chat-files/blob-1.pdf',
    }]);
  });
});
