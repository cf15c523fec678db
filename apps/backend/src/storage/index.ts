import { LocalStorageBackend } from './localStorage.js';
import { S3StorageBackend, createS3Client, normalizeKeyPrefix, type S3Config } from './s3Storage.js';
import { FileMetadataStore } from './fileMetadataStore.js';
import { BlobMetadataStore } from './blobMetadataStore.js';
import type { MetadataStore, StorageBackend } from './types.js';

export type StorageConfig = { kind: 'local'; rootDir: string } | { kind: 's3'; s3: S3Config };

export type PhotoStorage = {
  payloads: StorageBackend;
  metadata: MetadataStore;
};

export function createStorage(config: StorageConfig): PhotoStorage {
  if (config.kind === 'local') {
    return {
      payloads: new LocalStorageBackend(config.rootDir),
      metadata: new FileMetadataStore(config.rootDir),
    };
  }

  // Payloads and metadata documents share one client but live under separate prefixes.
  const client = createS3Client(config.s3);
  const base = normalizeKeyPrefix(config.s3.keyPrefix);
  const payloads = new S3StorageBackend({ ...config.s3, keyPrefix: `${base}photos` }, client);
  const documents = new S3StorageBackend({ ...config.s3, keyPrefix: `${base}metadata` }, client);
  return { payloads, metadata: new BlobMetadataStore(documents) };
}

export { StorageError, MetadataError } from './errors.js';
export type { StorageBackend, MetadataStore, StorageKind } from './types.js';
