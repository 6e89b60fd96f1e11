import { logger } from './lib/logger';
import type { AnalysisQueue } from './services/analysis/analysis-queue';

export interface ShutdownTarget {
  queue: AnalysisQueue;
  close: () => Promise<void>;
}

const SHUTDOWN_TIMEOUT_MS = 30_000;

async function gracefulShutdown(signal: string, target: ShutdownTarget): Promise<void> {
  logger.info({ signal }, 'Received shutdown signal');

  const timeout = setTimeout(() => {
    logger.error('Shutdown timed out after 30s, forcing exit');
    process.exit(1);
  }, SHUTDOWN_TIMEOUT_MS);

  try {
    logger.info('Closing HTTP server');
    await target.close();

    logger.info({ pending: target.queue.depth() }, 'Draining analysis queue');
    await target.queue.whenIdle();

    clearTimeout(timeout);
    logger.info('Graceful shutdown complete');
    process.exit(0);
  } catch (error) {
    clearTimeout(timeout);
    logger.error({ error }, 'Error during shutdown');
    process.exit(1);
  }
}

export function registerGracefulShutdownHandlers(target: ShutdownTarget): void {
  process.on('SIGTERM', () => {
    void gracefulShutdown('SIGTERM', target);
  });
  process.on('SIGINT', () => {
    void gracefulShutdown('SIGINT', target);
  });
}
