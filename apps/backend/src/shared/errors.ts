export const ERROR_CODES = {
  BAD_REQUEST: 'BAD_REQUEST',
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  PHOTO_NOT_FOUND: 'PHOTO_NOT_FOUND',
  MEDIA_NOT_AVAILABLE: 'MEDIA_NOT_AVAILABLE',
  // Uploads
  MISSING_FILE: 'MISSING_FILE',
  INVALID_FILE_TYPE: 'INVALID_FILE_TYPE',
  FILE_TOO_LARGE: 'FILE_TOO_LARGE',
  EMPTY_FILE: 'EMPTY_FILE',
  UPLOAD_TIMEOUT: 'UPLOAD_TIMEOUT',
  UPLOAD_FAILED: 'UPLOAD_FAILED',
  // Storage
  DELETE_FAILED: 'DELETE_FAILED',
  STORAGE_UNAVAILABLE: 'STORAGE_UNAVAILABLE',
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export const ERROR_MESSAGES: Record<ErrorCode, string> = {
  BAD_REQUEST: 'Bad request',
  VALIDATION_ERROR: 'Invalid request data',
  NOT_FOUND: 'Not found',
  PHOTO_NOT_FOUND: 'Photo not found',
  MEDIA_NOT_AVAILABLE: 'Photo is no longer available',
  MISSING_FILE: 'No file uploaded. Expected field name: "file"',
  INVALID_FILE_TYPE: 'Invalid file type',
  FILE_TOO_LARGE: 'File too large',
  EMPTY_FILE: 'Empty file not allowed',
  UPLOAD_TIMEOUT: 'Upload timed out',
  UPLOAD_FAILED: 'Upload failed, please try again',
  DELETE_FAILED: 'Delete failed, please try again',
  STORAGE_UNAVAILABLE: 'Storage is temporarily unavailable, please try again',
  RATE_LIMITED: 'Too many requests',
  TIMEOUT: 'Request timed out',
  INTERNAL_ERROR: 'Internal server error',
};

export class AppError extends Error {
  public readonly status: number;
  public readonly code: ErrorCode;
  public readonly details?: Record<string, unknown>;

  constructor(params: { status: number; code: ErrorCode; message?: string; details?: Record<string, unknown> }) {
    super(params.message || ERROR_MESSAGES[params.code]);
    this.name = 'AppError';
    this.status = params.status;
    this.code = params.code;
    this.details = params.details;
  }
}

export function defaultErrorCodeForStatus(status: number): ErrorCode {
  if (status === 400) return ERROR_CODES.BAD_REQUEST;
  if (status === 404) return ERROR_CODES.NOT_FOUND;
  if (status === 408) return ERROR_CODES.TIMEOUT;
  if (status === 410) return ERROR_CODES.MEDIA_NOT_AVAILABLE;
  if (status === 413) return ERROR_CODES.FILE_TOO_LARGE;
  if (status === 415) return ERROR_CODES.INVALID_FILE_TYPE;
  if (status === 429) return ERROR_CODES.RATE_LIMITED;
  if (status === 503) return ERROR_CODES.STORAGE_UNAVAILABLE;
  return ERROR_CODES.INTERNAL_ERROR;
}
