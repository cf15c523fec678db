import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';
import { logger } from '../utils/logger.js';
import { runWithRequestContext, type RequestContextStore } from '../utils/asyncContext.js';

const MAX_REQUEST_ID_LENGTH = 128;

function getOrCreateRequestId(req: Request): string {
  const incoming = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  const fromHeader = Array.isArray(incoming) ? incoming[0] : incoming;
  const trimmed = typeof fromHeader === 'string' ? fromHeader.trim() : '';
  if (trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH) return trimmed;
  return randomUUID();
}

export function requestContext(req: Request, res: Response, next: NextFunction) {
  const requestId = getOrCreateRequestId(req);
  req.requestId = requestId;
  res.setHeader('X-Request-Id', requestId);

  const store: RequestContextStore = { requestId, photoId: null };
  const start = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Math.round(Number(process.hrtime.bigint() - start) / 1_000_000);
    const base = {
      requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs,
      ...(store.photoId ? { photoId: store.photoId } : {}),
    };

    if (res.statusCode >= 500) {
      logger.error('http.request', base);
      return;
    }
    // Health probes are noisy.
    if (req.path === '/health') {
      logger.debug('http.request', base);
      return;
    }
    logger.info('http.request', base);
  });

  runWithRequestContext(store, () => next());
}
