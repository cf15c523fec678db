import multer from 'multer';
import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { logger } from '../utils/logger.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';
import { PhotoValidationError } from '../domain/photo/errors.js';
import type { PhotoPolicy } from '../domain/photo/policy.js';

export const UPLOAD_FIELD_NAME = 'file';

export type UploadMiddlewareOptions = {
  policy: PhotoPolicy;
  timeoutMs: number;
};

function toUploadError(err: unknown, policy: PhotoPolicy): unknown {
  if (!(err instanceof multer.MulterError)) return err;
  switch (err.code) {
    case 'LIMIT_FILE_SIZE':
      return PhotoValidationError.tooLarge(policy.maxFileSizeBytes);
    case 'LIMIT_UNEXPECTED_FILE':
      return new AppError({
        status: 400,
        code: ERROR_CODES.BAD_REQUEST,
        message: `Unexpected file field name. Expected field name: "${UPLOAD_FIELD_NAME}"`,
      });
    case 'LIMIT_FILE_COUNT':
    case 'LIMIT_PART_COUNT':
      return new AppError({ status: 400, code: ERROR_CODES.BAD_REQUEST, message: 'Only one file per upload' });
    default:
      return new AppError({ status: 400, code: ERROR_CODES.BAD_REQUEST, message: err.message });
  }
}

/**
 * Buffers the single `file` part in memory (bounded by the policy limit) and guards
 * against uploads that stall mid-stream.
 */
export function createUploadMiddleware(opts: UploadMiddlewareOptions): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: {
      fileSize: opts.policy.maxFileSizeBytes,
      files: 1,
    },
  }).single(UPLOAD_FIELD_NAME);

  return (req: Request, res: Response, next: NextFunction) => {
    let completed = false;

    const timeoutId = setTimeout(() => {
      if (completed) return;
      completed = true;
      logger.warn('photo.upload.timeout', { timeoutMs: opts.timeoutMs });
      next(new AppError({ status: 408, code: ERROR_CODES.UPLOAD_TIMEOUT }));
    }, opts.timeoutMs);

    upload(req, res, (err?: unknown) => {
      clearTimeout(timeoutId);
      // Timeout already answered the request.
      if (completed) return;
      completed = true;

      if (err) {
        const mapped = toUploadError(err, opts.policy);
        if (err instanceof multer.MulterError) {
          logger.info('photo.upload.multipart_rejected', { code: err.code, field: err.field });
        }
        next(mapped);
        return;
      }
      next();
    });
  };
}
