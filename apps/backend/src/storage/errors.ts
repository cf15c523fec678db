export type StorageErrorReason = 'not_found' | 'permission_denied' | 'unavailable' | 'corrupt';

export class StorageError extends Error {
  public readonly reason: StorageErrorReason;
  public readonly key: string | null;

  constructor(reason: StorageErrorReason, message: string, opts: { key?: string | null; cause?: unknown } = {}) {
    super(message, { cause: opts.cause });
    this.name = 'StorageError';
    this.reason = reason;
    this.key = opts.key ?? null;
  }

  /** Only transient failures are worth retrying. */
  get retryable(): boolean {
    return this.reason === 'unavailable';
  }
}

export type MetadataErrorReason = 'not_found' | 'corrupt';

export class MetadataError extends Error {
  public readonly reason: MetadataErrorReason;
  public readonly key: string;

  constructor(reason: MetadataErrorReason, key: string, opts: { message?: string; cause?: unknown } = {}) {
    super(opts.message ?? `Metadata ${reason === 'not_found' ? 'not found' : 'is corrupt'}: ${key}`, {
      cause: opts.cause,
    });
    this.name = 'MetadataError';
    this.reason = reason;
    this.key = key;
  }
}

type ErrorShape = { name?: string; code?: string; status?: number };

function readErrorShape(error: unknown): ErrorShape {
  if (typeof error !== 'object' || error === null) return {};
  const shape: ErrorShape = {};
  if ('name' in error && typeof error.name === 'string') shape.name = error.name;
  if ('code' in error && typeof error.code === 'string') shape.code = error.code;
  if ('$metadata' in error && typeof error.$metadata === 'object' && error.$metadata !== null) {
    const metadata = error.$metadata;
    if ('httpStatusCode' in metadata && typeof metadata.httpStatusCode === 'number') {
      shape.status = metadata.httpStatusCode;
    }
  }
  return shape;
}

export function errnoCode(error: unknown): string | undefined {
  return readErrorShape(error).code;
}

const FS_NOT_FOUND = new Set(['ENOENT', 'ENOTDIR']);
const FS_PERMISSION = new Set(['EACCES', 'EPERM', 'EROFS']);
const FS_CORRUPT = new Set(['EISDIR']);

export function storageErrorFromFs(error: unknown, key: string | null): StorageError {
  if (error instanceof StorageError) return error;
  const code = errnoCode(error) ?? 'UNKNOWN';
  const target = key ?? '<root>';
  if (FS_NOT_FOUND.has(code)) {
    return new StorageError('not_found', `Object not found: ${target}`, { key, cause: error });
  }
  if (FS_PERMISSION.has(code)) {
    return new StorageError('permission_denied', `Permission denied (${code}): ${target}`, { key, cause: error });
  }
  if (FS_CORRUPT.has(code)) {
    return new StorageError('corrupt', `Object is not a regular file: ${target}`, { key, cause: error });
  }
  // EIO, EMFILE, ENOSPC, EBUSY, ...: treat as transient.
  return new StorageError('unavailable', `Filesystem error (${code}): ${target}`, { key, cause: error });
}

const S3_NOT_FOUND = new Set(['NoSuchKey', 'NotFound', 'NoSuchBucket']);
const S3_PERMISSION = new Set([
  'AccessDenied',
  'Forbidden',
  'InvalidAccessKeyId',
  'SignatureDoesNotMatch',
  'ExpiredToken',
  'CredentialsProviderError',
]);

export function storageErrorFromS3(error: unknown, key: string | null): StorageError {
  if (error instanceof StorageError) return error;
  const { name, code, status } = readErrorShape(error);
  const label = name ?? code ?? 'UnknownError';
  const target = key ?? '<bucket>';
  if ((name && S3_NOT_FOUND.has(name)) || status === 404) {
    return new StorageError('not_found', `Object not found: ${target}`, { key, cause: error });
  }
  if ((name && S3_PERMISSION.has(name)) || status === 401 || status === 403) {
    return new StorageError('permission_denied', `Access denied (${label}): ${target}`, { key, cause: error });
  }
  // 5xx, throttling, timeouts and socket errors.
  return new StorageError('unavailable', `Blob store error (${label}): ${target}`, { key, cause: error });
}
