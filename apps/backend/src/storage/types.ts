import type { PhotoRecord } from '../domain/photo/PhotoRecord.js';

export type StorageKind = 'local' | 's3';

/**
 * Binary payload store. Keys are opaque, already-sanitized storage keys.
 * Failures surface as `StorageError` regardless of the backing implementation.
 */
export interface StorageBackend {
  readonly kind: StorageKind;

  put(key: string, body: Buffer, contentType: string): Promise<void>;

  /** Throws `StorageError('not_found')` when the key is absent. */
  get(key: string): Promise<Buffer>;

  exists(key: string): Promise<boolean>;

  /** Idempotent: deleting a missing key resolves. */
  delete(key: string): Promise<void>;

  /** Lazy enumeration in backend order; every call starts a fresh pass. */
  listKeys(): AsyncIterable<string>;

  /** Storage location reference for `key` (path or URL), computed without I/O. */
  locate(key: string): string;

  checkHealth(): Promise<void>;
}

/**
 * Structured photo records, one self-contained document per key.
 * `load` throws `MetadataError('not_found' | 'corrupt')`.
 */
export interface MetadataStore {
  save(record: PhotoRecord): Promise<void>;
  load(key: string): Promise<PhotoRecord>;
  delete(key: string): Promise<void>;
  /** Corrupt documents are skipped (and logged) instead of failing the enumeration. */
  list(): AsyncIterable<PhotoRecord>;
}

/** Sidecar suffix used by the local layout: `<key>` + `<key>.metadata.json`. */
export const METADATA_SUFFIX = '.metadata.json';
