import type { Server as HttpServer } from 'http';
import type { Socket } from 'net';
import { logger, errorMeta } from '../utils/logger.js';

type ShutdownDeps = {
  httpServer: HttpServer;
  shutdownTimeoutMs: number;
};

export type ShutdownController = {
  isShuttingDown: () => boolean;
  shutdown: (signal: NodeJS.Signals) => Promise<void>;
};

export function setupShutdownHandlers(deps: ShutdownDeps): ShutdownController {
  const { httpServer } = deps;
  let shuttingDown = false;

  const activeHttpConnections = new Set<Socket>();
  httpServer.on('connection', (socket) => {
    activeHttpConnections.add(socket);
    socket.on('close', () => {
      activeHttpConnections.delete(socket);
    });
  });

  async function closeHttpServerWithDrain(timeoutMs: number): Promise<void> {
    if (!httpServer.listening) return;
    await new Promise<void>((resolve) => {
      let settled = false;
      const done = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve();
      };

      // In-flight uploads get until the deadline; then remaining sockets are cut.
      const timer = setTimeout(() => {
        logger.warn('shutdown.http_drain_timeout', {
          timeoutMs,
          openConnections: activeHttpConnections.size,
        });
        for (const socket of activeHttpConnections) {
          socket.destroy();
        }
        done();
      }, timeoutMs);
      timer.unref();

      httpServer.close((err) => {
        if (err) logger.error('shutdown.http_close_failed', errorMeta(err));
        done();
      });
      httpServer.closeIdleConnections();
    });
  }

  async function shutdown(signal: NodeJS.Signals): Promise<void> {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.info('shutdown.start', { signal, timeoutMs: deps.shutdownTimeoutMs });

    const timer = setTimeout(() => {
      logger.error('shutdown.timeout', { signal, timeoutMs: deps.shutdownTimeoutMs });
      process.exit(1);
    }, deps.shutdownTimeoutMs + 1000);
    timer.unref();

    await closeHttpServerWithDrain(deps.shutdownTimeoutMs);

    clearTimeout(timer);
    logger.info('shutdown.complete', { signal });
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  return { isShuttingDown: () => shuttingDown, shutdown };
}
