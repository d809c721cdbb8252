import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { LocalBlobStore } from '../../src/services/blobStore';

describe('LocalBlobStore', () => {
  let directory: string;
  let store: LocalBlobStore;

  beforeEach(async () => {
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'chat-blobs-'));
    store = new LocalBlobStore(directory);
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  test('stores bytes with their content type under an opaque handle', async () => {
    const handle = await store.put(Buffer.from('fabric swatch'), 'swatch.jpg', 'image/jpeg');

    expect(handle).toMatch(/^[0-9a-f-]{36}\.jpg$/);
    const blob = await store.get(handle);
    expect(blob.data.toString()).toBe('fabric swatch');
    expect(blob.contentType).toBe('image/jpeg');
  });

  test('delete removes the blob and reports missing ones', async () => {
    const errorLog = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const handle = await store.put(Buffer.from('x'), 'note.txt', 'text/plain');

    await expect(store.delete(handle)).resolves.toBe(true);
    await expect(store.get(handle)).rejects.toThrow();
    await expect(store.delete(handle)).resolves.toBe(false);
    errorLog.mockRestore();
  });

  test('refuses handles that escape the directory', async () => {
    await expect(store.get('../secrets.txt')).rejects.toThrow('Invalid blob handle: ../secrets.txt');
  });
});
