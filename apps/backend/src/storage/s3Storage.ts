import {
  S3Client,
  PutObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  DeleteObjectCommand,
  ListObjectsV2Command,
  HeadBucketCommand,
  type GetObjectCommandOutput,
  type ListObjectsV2CommandOutput,
  type S3ClientConfig,
} from '@aws-sdk/client-s3';
import { StorageError, storageErrorFromS3 } from './errors.js';
import type { StorageBackend } from './types.js';

export type S3Config = {
  endpoint?: string;
  region: string;
  bucket: string;
  /** Namespace inside the bucket, e.g. "prod/photos/". */
  keyPrefix: string;
  /** When set, `locate` returns public URLs instead of `s3://` references. */
  publicBaseUrl?: string;
  forcePathStyle: boolean;
  /**
   * Injected credential provider. Left undefined, the SDK default provider chain is used
   * (instance profile, container or workload identity), so no secret has to be configured.
   */
  credentials?: S3ClientConfig['credentials'];
};

function safeJoinUrl(base: string, pathPart: string): string {
  const b = base.endsWith('/') ? base.slice(0, -1) : base;
  const p = pathPart.startsWith('/') ? pathPart.slice(1) : pathPart;
  return `${b}/${p}`;
}

export function normalizeKeyPrefix(prefix: string): string {
  const trimmed = prefix.replace(/^\/+|\/+$/g, '');
  return trimmed ? `${trimmed}/` : '';
}

export function createS3Client(cfg: S3Config): S3Client {
  return new S3Client({
    region: cfg.region,
    endpoint: cfg.endpoint,
    forcePathStyle: cfg.forcePathStyle,
    credentials: cfg.credentials,
  });
}

export class S3StorageBackend implements StorageBackend {
  readonly kind = 's3' as const;
  private readonly cfg: S3Config;
  private readonly client: S3Client;
  private readonly prefix: string;

  constructor(cfg: S3Config, client: S3Client = createS3Client(cfg)) {
    this.cfg = cfg;
    this.client = client;
    this.prefix = normalizeKeyPrefix(cfg.keyPrefix);
  }

  private objectKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async put(key: string, body: Buffer, contentType: string): Promise<void> {
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.cfg.bucket,
          Key: this.objectKey(key),
          Body: body,
          ContentType: contentType,
          ContentLength: body.length,
          // Keys are never reused → safe to cache "forever".
          CacheControl: 'public, max-age=31536000, immutable',
        })
      );
    } catch (error) {
      throw storageErrorFromS3(error, key);
    }
  }

  async get(key: string): Promise<Buffer> {
    let res: GetObjectCommandOutput;
    try {
      res = await this.client.send(new GetObjectCommand({ Bucket: this.cfg.bucket, Key: this.objectKey(key) }));
    } catch (error) {
      throw storageErrorFromS3(error, key);
    }

    if (!res.Body) {
      throw new StorageError('corrupt', `Object has no body: ${key}`, { key });
    }
    try {
      return Buffer.from(await res.Body.transformToByteArray());
    } catch (error) {
      throw storageErrorFromS3(error, key);
    }
  }

  async exists(key: string): Promise<boolean> {
    try {
      await this.client.send(new HeadObjectCommand({ Bucket: this.cfg.bucket, Key: this.objectKey(key) }));
      return true;
    } catch (error) {
      const mapped = storageErrorFromS3(error, key);
      if (mapped.reason === 'not_found') return false;
      throw mapped;
    }
  }

  async delete(key: string): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: this.cfg.bucket, Key: this.objectKey(key) }));
    } catch (error) {
      const mapped = storageErrorFromS3(error, key);
      if (mapped.reason === 'not_found') return;
      throw mapped;
    }
  }

  async *listKeys(): AsyncIterable<string> {
    let continuationToken: string | undefined;
    do {
      let page: ListObjectsV2CommandOutput;
      try {
        page = await this.client.send(
          new ListObjectsV2Command({
            Bucket: this.cfg.bucket,
            Prefix: this.prefix || undefined,
            ContinuationToken: continuationToken,
          })
        );
      } catch (error) {
        throw storageErrorFromS3(error, null);
      }

      for (const object of page.Contents ?? []) {
        if (!object.Key || !object.Key.startsWith(this.prefix)) continue;
        const key = object.Key.slice(this.prefix.length);
        // "Directories" below the prefix belong to other namespaces.
        if (!key || key.includes('/')) continue;
        yield key;
      }

      continuationToken = page.IsTruncated ? page.NextContinuationToken : undefined;
    } while (continuationToken);
  }

  locate(key: string): string {
    const objectKey = this.objectKey(key);
    if (this.cfg.publicBaseUrl) return safeJoinUrl(this.cfg.publicBaseUrl, objectKey);
    return `s3://${this.cfg.bucket}/${objectKey}`;
  }

  async checkHealth(): Promise<void> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: this.cfg.bucket }));
    } catch (error) {
      throw storageErrorFromS3(error, null);
    }
  }
}
