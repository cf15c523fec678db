import { Router } from 'express';
import type { Health } from '@photo-uploader/api-contracts';
import type { StorageBackend } from '../storage/types.js';
import { logger, errorMeta } from '../utils/logger.js';

export type HealthRouteDeps = {
  payloads: StorageBackend;
  isShuttingDown?: () => boolean;
};

export function createHealthRouter(deps: HealthRouteDeps): Router {
  const router = Router();

  router.get('/health', async (_req, res) => {
    const base = { storage: deps.payloads.kind, timestamp: new Date().toISOString() };

    if (deps.isShuttingDown?.()) {
      const body: Health = { ...base, status: 'unhealthy', error: 'Server is shutting down' };
      res.status(503).json(body);
      return;
    }

    try {
      await deps.payloads.checkHealth();
      const body: Health = { ...base, status: 'healthy' };
      res.json(body);
    } catch (error) {
      logger.warn('health.storage_unhealthy', { storage: deps.payloads.kind, ...errorMeta(error) });
      const body: Health = {
        ...base,
        status: 'unhealthy',
        error: error instanceof Error ? error.message : String(error),
      };
      res.status(503).json(body);
    }
  });

  return router;
}
