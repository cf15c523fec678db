import rateLimit from 'express-rate-limit';
import type { Request, RequestHandler, Response } from 'express';
import { logger } from '../utils/logger.js';
import { AppError, ERROR_CODES } from '../shared/errors.js';

export type UploadLimiterOptions = {
  max: number;
  windowMs: number;
};

// Get client IP from request (handles proxy headers)
export function getClientIP(req: Request): string {
  const realIP = req.headers['x-real-ip'];
  if (realIP) {
    const ip = Array.isArray(realIP) ? realIP[0] : realIP;
    if (ip && ip.trim() && ip !== 'unknown') return ip.trim();
  }

  // "client, proxy1, proxy2": the first entry is the client.
  const forwardedFor = req.headers['x-forwarded-for'];
  if (forwardedFor) {
    const ips = Array.isArray(forwardedFor) ? forwardedFor[0] : forwardedFor;
    const firstIP = (ips ?? '').split(',')[0]?.trim();
    if (firstIP && firstIP !== 'unknown') return firstIP;
  }

  return req.socket.remoteAddress || req.ip || 'unknown';
}

export function createUploadLimiter(opts: UploadLimiterOptions): RequestHandler {
  return rateLimit({
    windowMs: opts.windowMs,
    limit: opts.max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: (req) => `ip:${getClientIP(req)}`,
    handler: (req: Request, _res: Response, next) => {
      logger.warn('security.rate_limit.blocked', {
        limiter: 'upload',
        ip: getClientIP(req),
        path: req.path,
        method: req.method,
        limit: opts.max,
        windowMs: opts.windowMs,
      });
      next(
        new AppError({
          status: 429,
          code: ERROR_CODES.RATE_LIMITED,
          message: 'Too many upload requests, please try again later.',
          details: { retryAfterSeconds: Math.ceil(opts.windowMs / 1000) },
        })
      );
    },
  });
}
