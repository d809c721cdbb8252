import { S3Client, PutObjectCommand, GetObjectCommand, DeleteObjectCommand } from '@aws-sdk/client-s3';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';

export interface StoredBlob {
  data: Buffer;
  contentType: string;
}

/** Opaque handle -> bytes store for chat attachments. */
export interface BlobStore {
  put(data: Buffer, filename: string, contentType: string): Promise<string>;
  get(handle: string): Promise<StoredBlob>;
  delete(handle: string): Promise<boolean>;
}

export interface S3BlobStoreOptions {
  bucket: string;
  region: string;
  prefix?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
}

export class S3BlobStore implements BlobStore {
  private readonly client: S3Client;
  private readonly prefix: string;

  constructor(private readonly options: S3BlobStoreOptions) {
    this.prefix = (options.prefix || 'chat-files').replace(/\/$/, '');
    this.client = new S3Client({
      region: options.region,
      credentials: options.accessKeyId && options.secretAccessKey
        ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
        : undefined,
      requestChecksumCalculation: 'WHEN_REQUIRED',
    });
  }

  async put(data: Buffer, filename: string, contentType: string): Promise<string> {
    const key = `${this.prefix}/${uuidv4()}${path.extname(filename)}`;

    await this.client.send(new PutObjectCommand({
      Bucket: this.options.bucket,
      Key: key,
      Body: data,
      ContentType: contentType,
    }));

    return key;
  }

  async get(handle: string): Promise<StoredBlob> {
    const response = await this.client.send(new GetObjectCommand({
      Bucket: this.options.bucket,
      Key: handle,
    }));

    if (!response.Body) {
      throw new Error(`Blob ${handle} has no body`);
    }

    const bytes = await response.Body.transformToByteArray();
    return {
      data: Buffer.from(bytes),
      contentType: response.ContentType || 'application/octet-stream',
    };
  }

  async delete(handle: string): Promise<boolean> {
    try {
      await this.client.send(new DeleteObjectCommand({
        Bucket: this.options.bucket,
        Key: handle,
      }));
      return true;
    } catch (error) {
      console.error(`❌ Error deleting blob ${handle}:`, error);
      return false;
    }
  }
}

const CONTENT_TYPE_SUFFIX = '.content-type';

/** Disk-backed store for development when no bucket is configured. */
export class LocalBlobStore implements BlobStore {
  constructor(private readonly directory: string) {}

  private resolve(handle: string): string {
    const filename = path.basename(handle);
    if (filename !== handle) {
      throw new Error(`Invalid blob handle: ${handle}`);
    }
    return path.join(this.directory, filename);
  }

  async put(data: Buffer, filename: string, contentType: string): Promise<string> {
    await fs.mkdir(this.directory, { recursive: true });
    const handle = `${uuidv4()}${path.extname(filename)}`;
    await fs.writeFile(this.resolve(handle), data);
    await fs.writeFile(`${this.resolve(handle)}${CONTENT_TYPE_SUFFIX}`, contentType);
    return handle;
  }

  async get(handle: string): Promise<StoredBlob> {
    const target = this.resolve(handle);
    const data = await fs.readFile(target);
    const contentType = await fs.readFile(`${target}${CONTENT_TYPE_SUFFIX}`, 'utf8')
      .catch(() => 'application/octet-stream');
    return { data, contentType };
  }

  async delete(handle: string): Promise<boolean> {
    try {
      const target = this.resolve(handle);
      await fs.rm(target);
      await fs.rm(`${target}${CONTENT_TYPE_SUFFIX}`, { force: true });
      return true;
    } catch (error) {
      console.error(`❌ Error deleting local blob ${handle}:`, error);
      return false;
    }
  }
}

export const createBlobStoreFromEnv = (): BlobStore => {
  const bucket = process.env.S3_BUCKET_NAME;
  if (!bucket) {
    if (process.env.NODE_ENV === 'production') {
      throw new Error('S3_BUCKET_NAME environment variable is not set');
    }
    const directory = path.join(process.cwd(), 'uploads', 'chat-files');
    console.warn(`⚠️ S3_BUCKET_NAME not set. Storing chat files locally in ${directory}`);
    return new LocalBlobStore(directory);
  }

  return new S3BlobStore({
    bucket,
    region: process.env.S3_REGION || 'us-east-1',
    prefix: process.env.S3_CHAT_PREFIX,
    accessKeyId: process.env.S3_ACCESS_KEY_ID,
    secretAccessKey: process.env.S3_SECRET_ACCESS_KEY,
  });
};
