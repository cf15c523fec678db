import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const s3Mocks = vi.hoisted(() => {
  const clients: Array<{ config: Record<string, unknown>; send: ReturnType<typeof vi.fn> }> = [];
  const send = vi.fn();
  class S3Client {
    public send: ReturnType<typeof vi.fn>;
    public config: Record<string, unknown>;
    constructor(config: Record<string, unknown>) {
      this.send = send;
      this.config = config;
      clients.push(this);
    }
  }
  class Command {
    public input: Record<string, unknown>;
    constructor(input: Record<string, unknown>) {
      this.input = input;
    }
  }
  class PutObjectCommand extends Command {}
  class GetObjectCommand extends Command {}
  class HeadObjectCommand extends Command {}
  class DeleteObjectCommand extends Command {}
  class ListObjectsV2Command extends Command {}
  class HeadBucketCommand extends Command {}
  return {
    S3Client,
    PutObjectCommand,
    GetObjectCommand,
    HeadObjectCommand,
    DeleteObjectCommand,
    ListObjectsV2Command,
    HeadBucketCommand,
    send,
    clients,
  };
});

vi.mock('@aws-sdk/client-s3', () => ({
  S3Client: s3Mocks.S3Client,
  PutObjectCommand: s3Mocks.PutObjectCommand,
  GetObjectCommand: s3Mocks.GetObjectCommand,
  HeadObjectCommand: s3Mocks.HeadObjectCommand,
  DeleteObjectCommand: s3Mocks.DeleteObjectCommand,
  ListObjectsV2Command: s3Mocks.ListObjectsV2Command,
  HeadBucketCommand: s3Mocks.HeadBucketCommand,
}));

import { S3StorageBackend, normalizeKeyPrefix, type S3Config } from '../src/storage/s3Storage.js';
import { createStorage } from '../src/storage/index.js';
import { StorageError } from '../src/storage/errors.js';

const baseConfig: S3Config = {
  region: 'us-east-1',
  bucket: 'photos-bucket',
  keyPrefix: '/prod/photos/',
  forcePathStyle: false,
};

function awsError(name: string, httpStatusCode: number): Error {
  return Object.assign(new Error(name), { name, $metadata: { httpStatusCode } });
}

function sentCommands(): Array<{ input: Record<string, unknown> }> {
  return s3Mocks.send.mock.calls.map((call) => call[0]);
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const out: string[] = [];
  for await (const item of iterable) out.push(item);
  return out;
}

beforeEach(() => {
  s3Mocks.send.mockReset();
  s3Mocks.clients.length = 0;
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('S3StorageBackend', () => {
  it('normalizes key prefixes', () => {
    expect(normalizeKeyPrefix('/prod/photos/')).toBe('prod/photos/');
    expect(normalizeKeyPrefix('photos')).toBe('photos/');
    expect(normalizeKeyPrefix('')).toBe('');
  });

  it('passes region, endpoint and injected credentials to the client', () => {
    new S3StorageBackend({
      ...baseConfig,
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
    expect(s3Mocks.clients[0]?.config).toEqual({
      region: 'us-east-1',
      endpoint: 'http://localhost:9000',
      forcePathStyle: true,
      credentials: { accessKeyId: 'test-key', secretAccessKey: 'test-secret' },
    });
  });

  it('put uploads under the prefix with content metadata', async () => {
    s3Mocks.send.mockResolvedValue({});
    const storage = new S3StorageBackend(baseConfig);

    await storage.put('a.jpg', Buffer.from('jpeg'), 'image/jpeg');

    const [command] = sentCommands();
    expect(command).toBeInstanceOf(s3Mocks.PutObjectCommand);
    expect(command?.input).toMatchObject({
      Bucket: 'photos-bucket',
      Key: 'prod/photos/a.jpg',
      ContentType: 'image/jpeg',
      ContentLength: 4,
      CacheControl: 'public, max-age=31536000, immutable',
    });
  });

  it('get reads the body bytes', async () => {
    s3Mocks.send.mockResolvedValue({ Body: { transformToByteArray: async () => Uint8Array.from([1, 2, 3]) } });
    const storage = new S3StorageBackend(baseConfig);

    const body = await storage.get('a.jpg');

    expect([...body]).toEqual([1, 2, 3]);
    expect(sentCommands()[0]?.input).toEqual({ Bucket: 'photos-bucket', Key: 'prod/photos/a.jpg' });
  });

  it('get maps NoSuchKey to not_found', async () => {
    s3Mocks.send.mockRejectedValue(awsError('NoSuchKey', 404));
    const storage = new S3StorageBackend(baseConfig);

    const err = await storage.get('a.jpg').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    expect(err).toMatchObject({ reason: 'not_found', key: 'a.jpg' });
  });

  it('exists distinguishes missing objects from outages', async () => {
    const storage = new S3StorageBackend(baseConfig);

    s3Mocks.send.mockResolvedValueOnce({});
    expect(await storage.exists('a.jpg')).toBe(true);

    s3Mocks.send.mockRejectedValueOnce(awsError('NotFound', 404));
    expect(await storage.exists('a.jpg')).toBe(false);

    s3Mocks.send.mockRejectedValueOnce(awsError('ServiceUnavailable', 503));
    const err = await storage.exists('a.jpg').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(StorageError);
    expect(err instanceof StorageError && err.retryable).toBe(true);
  });

  it('delete ignores missing objects', async () => {
    s3Mocks.send.mockRejectedValue(awsError('NoSuchKey', 404));
    const storage = new S3StorageBackend(baseConfig);
    await expect(storage.delete('a.jpg')).resolves.toBeUndefined();
    expect(sentCommands()[0]).toBeInstanceOf(s3Mocks.DeleteObjectCommand);
  });

  it('listKeys follows continuation tokens and skips nested keys', async () => {
    s3Mocks.send
      .mockResolvedValueOnce({
        Contents: [{ Key: 'prod/photos/a.jpg' }, { Key: 'prod/photos/sub/x.jpg' }, { Key: 'prod/photos/b.png' }],
        IsTruncated: true,
        NextContinuationToken: 't1',
      })
      .mockResolvedValueOnce({ Contents: [{ Key: 'prod/photos/c.gif' }], IsTruncated: false });
    const storage = new S3StorageBackend(baseConfig);

    expect(await collect(storage.listKeys())).toEqual(['a.jpg', 'b.png', 'c.gif']);
    expect(sentCommands().map((c) => c.input)).toEqual([
      { Bucket: 'photos-bucket', Prefix: 'prod/photos/', ContinuationToken: undefined },
      { Bucket: 'photos-bucket', Prefix: 'prod/photos/', ContinuationToken: 't1' },
    ]);
  });

  it('locate prefers the public base url', () => {
    expect(new S3StorageBackend(baseConfig).locate('a.jpg')).toBe('s3://photos-bucket/prod/photos/a.jpg');
    expect(
      new S3StorageBackend({ ...baseConfig, publicBaseUrl: 'https://cdn.example.com/' }).locate('a.jpg')
    ).toBe('https://cdn.example.com/prod/photos/a.jpg');
  });

  it('checkHealth maps access errors to permission_denied', async () => {
    s3Mocks.send.mockRejectedValue(awsError('Forbidden', 403));
    const storage = new S3StorageBackend(baseConfig);
    await expect(storage.checkHealth()).rejects.toMatchObject({ reason: 'permission_denied' });
    expect(sentCommands()[0]?.input).toEqual({ Bucket: 'photos-bucket' });
  });
});

describe('createStorage (s3)', () => {
  it('keeps payloads and metadata under separate prefixes on one client', async () => {
    s3Mocks.send.mockResolvedValue({});
    const storage = createStorage({ kind: 's3', s3: { ...baseConfig, keyPrefix: 'prod' } });

    await storage.payloads.put('a.jpg', Buffer.from('x'), 'image/jpeg');
    await storage.metadata.save({
      key: 'a.jpg',
      originalFilename: 'a.jpg',
      contentType: 'image/jpeg',
      sizeBytes: 1,
      album: null,
      description: null,
      tags: [],
      createdAt: new Date('2026-10-19T10:15:00.000Z'),
      storageLocation: storage.payloads.locate('a.jpg'),
    });

    expect(s3Mocks.clients).toHaveLength(1);
    expect(sentCommands().map((c) => c.input.Key)).toEqual(['prod/photos/a.jpg', 'prod/metadata/a.jpg.json']);
    expect(storage.payloads.locate('a.jpg')).toBe('s3://photos-bucket/prod/photos/a.jpg');
  });
});
