import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import { requestContext } from './middleware/requestContext.js';
import { createUploadMiddleware } from './middleware/upload.js';
import { createUploadLimiter } from './middleware/rateLimit.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { createHealthRouter } from './routes/health.js';
import { createPhotosRouter } from './api/v1/photos/router.js';
import { PHOTOS_BASE_PATH } from './api/v1/photos/mappers.js';
import { PhotoUploadService } from './domain/photo/PhotoUploadService.js';
import { GalleryService } from './domain/photo/GalleryService.js';
import { PhotoService } from './domain/photo/PhotoService.js';
import type { PhotoPolicy } from './domain/photo/policy.js';
import type { PhotoStorage } from './storage/index.js';

export type AppOptions = {
  storage: PhotoStorage;
  policy: PhotoPolicy;
  corsOrigins: string[];
  jsonBodyLimit: string;
  uploadTimeoutMs: number;
  uploadRateLimit: { max: number; windowMs: number };
  trustProxy?: boolean | number;
  isShuttingDown?: () => boolean;
};

export function createApp(opts: AppOptions): express.Express {
  const app = express();
  const { payloads, metadata } = opts.storage;

  // Behind one reverse proxy, so the rate limiter sees client IPs.
  app.set('trust proxy', opts.trustProxy ?? 1);
  app.disable('x-powered-by');

  app.use(requestContext);
  app.use(
    compression({
      // Image bytes are already compressed.
      filter: (req, res) => {
        const type = String(res.getHeader('Content-Type') ?? '');
        if (type.startsWith('image/')) return false;
        return compression.filter(req, res);
      },
    })
  );
  app.use(
    helmet({
      crossOriginResourcePolicy: { policy: 'cross-origin' },
    })
  );
  app.use(
    cors({
      // No configured origins: allow any origin (the API carries no cookies).
      origin: opts.corsOrigins.length > 0 ? opts.corsOrigins : true,
      exposedHeaders: ['X-Request-Id', 'Location'],
    })
  );
  app.use(express.json({ limit: opts.jsonBodyLimit }));

  app.use(createHealthRouter({ payloads, isShuttingDown: opts.isShuttingDown }));

  app.use(
    PHOTOS_BASE_PATH,
    createPhotosRouter({
      services: {
        uploads: new PhotoUploadService({ payloads, metadata, policy: opts.policy }),
        gallery: new GalleryService({ payloads, metadata }),
        photos: new PhotoService({ payloads, metadata }),
      },
      upload: createUploadMiddleware({ policy: opts.policy, timeoutMs: opts.uploadTimeoutMs }),
      uploadLimiter: createUploadLimiter(opts.uploadRateLimit),
    })
  );

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
