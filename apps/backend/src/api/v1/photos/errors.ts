import { AppError, ERROR_CODES } from '../../../shared/errors.js';
import { StorageError } from '../../../storage/errors.js';
import {
  PartialDeleteError,
  PhotoNotFoundError,
  PhotoUnavailableError,
  PhotoValidationError,
  UploadFailure,
} from '../../../domain/photo/errors.js';

function isRetryableStorageCause(error: unknown): boolean {
  return error instanceof StorageError && error.retryable;
}

/** Maps domain failures onto the HTTP error catalogue; returns null for anything unknown. */
export function toAppError(err: unknown): AppError | null {
  if (err instanceof AppError) return err;

  if (err instanceof PhotoValidationError) {
    if (err.reason === 'unsupported_type') {
      return new AppError({ status: 415, code: ERROR_CODES.INVALID_FILE_TYPE, message: err.message, details: err.details });
    }
    if (err.reason === 'too_large') {
      return new AppError({ status: 413, code: ERROR_CODES.FILE_TOO_LARGE, message: err.message, details: err.details });
    }
    return new AppError({ status: 400, code: ERROR_CODES.EMPTY_FILE, message: err.message, details: err.details });
  }

  if (err instanceof UploadFailure) {
    // Internal causes stay in the logs; the client only learns whether retrying may help.
    if (isRetryableStorageCause(err.cause)) {
      return new AppError({ status: 503, code: ERROR_CODES.STORAGE_UNAVAILABLE });
    }
    return new AppError({ status: 500, code: ERROR_CODES.UPLOAD_FAILED });
  }

  if (err instanceof PhotoNotFoundError) {
    return new AppError({ status: 404, code: ERROR_CODES.PHOTO_NOT_FOUND });
  }

  if (err instanceof PhotoUnavailableError) {
    return new AppError({ status: 410, code: ERROR_CODES.MEDIA_NOT_AVAILABLE });
  }

  if (err instanceof PartialDeleteError) {
    return new AppError({
      status: 500,
      code: ERROR_CODES.DELETE_FAILED,
      details: { metadataDeleted: err.metadataDeleted, payloadDeleted: err.payloadDeleted },
    });
  }

  if (err instanceof StorageError && err.retryable) {
    return new AppError({ status: 503, code: ERROR_CODES.STORAGE_UNAVAILABLE });
  }

  return null;
}
