import './config/loadEnv.js';
import fs from 'fs';
import { createServer } from 'http';
import { validateEnv, photoPolicyFromEnv, storageConfigFromEnv, corsOriginsFromEnv } from './config/env.js';
import { createStorage } from './storage/index.js';
import { createApp } from './app.js';
import { setupShutdownHandlers, type ShutdownController } from './server/shutdown.js';
import { logger, errorMeta } from './utils/logger.js';
import { formatMegabytes } from './domain/photo/policy.js';

const env = validateEnv();
const policy = photoPolicyFromEnv(env);
const storageConfig = storageConfigFromEnv(env);
const storage = createStorage(storageConfig);

let shutdownController: ShutdownController | null = null;

const app = createApp({
  storage,
  policy,
  corsOrigins: corsOriginsFromEnv(env),
  jsonBodyLimit: env.JSON_BODY_LIMIT,
  uploadTimeoutMs: env.UPLOAD_TIMEOUT_MS,
  uploadRateLimit: { max: env.UPLOAD_RATE_LIMIT_MAX, windowMs: env.UPLOAD_RATE_LIMIT_WINDOW_MS },
  isShuttingDown: () => shutdownController?.isShuttingDown() ?? false,
});

const httpServer = createServer(app);
// Large uploads over slow links need more than Node's defaults.
httpServer.requestTimeout = env.UPLOAD_TIMEOUT_MS + 10_000;
httpServer.keepAliveTimeout = 65_000;
httpServer.headersTimeout = 66_000;

shutdownController = setupShutdownHandlers({ httpServer, shutdownTimeoutMs: env.SHUTDOWN_TIMEOUT_MS });

async function startServer(): Promise<void> {
  if (storageConfig.kind === 'local') {
    await fs.promises.mkdir(storageConfig.rootDir, { recursive: true });
  }

  try {
    await storage.payloads.checkHealth();
  } catch (error) {
    // Not fatal: /health reports it until the backend recovers.
    logger.warn('startup.storage_unhealthy', { storage: storage.payloads.kind, ...errorMeta(error) });
  }

  httpServer.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      logger.error('startup.port_in_use', { port: env.PORT });
    } else {
      logger.error('startup.server_error', errorMeta(err));
    }
    process.exit(1);
  });

  httpServer.listen(env.PORT, () => {
    logger.info('startup.listening', {
      port: env.PORT,
      env: env.NODE_ENV,
      storage: storage.payloads.kind,
      ...(storageConfig.kind === 'local' ? { uploadDir: storageConfig.rootDir } : { bucket: storageConfig.s3.bucket }),
      maxFileSize: formatMegabytes(policy.maxFileSizeBytes),
      allowedContentTypes: policy.allowedContentTypes,
    });
  });
}

startServer().catch((error: unknown) => {
  logger.error('startup.failed', errorMeta(error));
  process.exit(1);
});
