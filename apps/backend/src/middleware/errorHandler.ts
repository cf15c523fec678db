import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import type { ErrorResponse } from '@photo-uploader/api-contracts';
import { logger } from '../utils/logger.js';
import { AppError, ERROR_CODES, ERROR_MESSAGES, defaultErrorCodeForStatus } from '../shared/errors.js';
import { toAppError } from '../api/v1/photos/errors.js';

// body-parser attaches an HTTP status to the errors it raises.
function readHttpStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status !== 'number' || status < 400 || status > 599) return null;
  return status;
}

function normalizeError(err: unknown): AppError {
  if (err instanceof ZodError) {
    return new AppError({
      status: 400,
      code: ERROR_CODES.VALIDATION_ERROR,
      details: {
        issues: err.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    });
  }

  const mapped = toAppError(err);
  if (mapped) return mapped;

  const status = readHttpStatus(err);
  if (status !== null && status < 500) {
    return new AppError({ status, code: defaultErrorCodeForStatus(status) });
  }

  // Never expose internals in production.
  const isProduction = process.env.NODE_ENV === 'production';
  return new AppError({
    status: 500,
    code: ERROR_CODES.INTERNAL_ERROR,
    message: !isProduction && err instanceof Error ? err.message : ERROR_MESSAGES.INTERNAL_ERROR,
  });
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
  const requestId = req.requestId;
  const appError = normalizeError(err);
  const isProduction = process.env.NODE_ENV === 'production';

  const meta = {
    requestId,
    method: req.method,
    path: req.path,
    status: appError.status,
    errorCode: appError.code,
    errorName: err instanceof Error ? err.name : typeof err,
    errorMessage: err instanceof Error ? err.message : String(err),
    ...(err instanceof Error && err.cause instanceof Error ? { cause: err.cause.message } : {}),
    // Stack can contain sensitive paths; keep it only outside production.
    ...(!isProduction && err instanceof Error ? { stack: err.stack } : {}),
  };
  if (appError.status >= 500) logger.error('http.error', meta);
  else logger.info('http.error', meta);

  if (res.headersSent) {
    logger.warn('http.error.headersSent', { requestId, method: req.method, path: req.path });
    next(err);
    return;
  }

  const response: ErrorResponse = {
    success: false,
    error: {
      code: appError.code,
      message: appError.message,
      ...(appError.details ? { details: appError.details } : {}),
      ...(requestId ? { requestId } : {}),
    },
  };
  res.status(appError.status).json(response);
}

export function notFoundHandler(req: Request, _res: Response, next: NextFunction) {
  next(new AppError({ status: 404, code: ERROR_CODES.NOT_FOUND, message: `Route not found: ${req.method} ${req.path}` }));
}
