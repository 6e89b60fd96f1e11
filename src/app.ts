/**
 * Water Flow Monitor HTTP app
 *
 * Built from a services container so tests can drive it with `app.request`
 * against an in-memory store and a fake reasoning client.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { cors } from 'hono/cors';
import { logger as honoLogger } from 'hono/logger';
import { getConfigStatus } from './lib/config-parser';
import { handleNotFoundError } from './lib/error-handler';
import { logger } from './lib/logger';
import { createAlertsRouter } from './routes/alerts';
import { createAnalysisRouter } from './routes/analysis';
import { createDevicesRouter } from './routes/devices';
import { createSimulatorRouter } from './routes/simulator';
import { createTelemetryRouter } from './routes/telemetry';
import type { AppServices } from './services/container';

export const SERVICE_NAME = 'water-flow-monitor';
export const APP_VERSION = process.env.npm_package_version ?? '1.0.0';

export const ENDPOINTS = [
  'POST /flow',
  'GET /history',
  'GET /latest',
  'GET /statistics',
  'GET /trends',
  'POST /analyze-now',
  'GET /analyze-now',
  'GET /analysis/status',
  'POST /analysis/stream',
  'GET /alerts',
  'POST /alerts',
  'GET /devices',
  'GET /config/:device_id',
  'PUT /config/:device_id',
  'POST /simulator/generate',
  'GET /health',
] as const;

export interface AppOptions {
  allowedOrigins?: '*' | string[];
}

export function createApp(services: AppServices, options: AppOptions = {}): Hono {
  const app = new Hono();

  // Access log through pino instead of stdout
  app.use('*', honoLogger((message: string, ...rest: string[]) => {
    logger.debug([message, ...rest].join(' '));
  }));
  app.use('*', cors({ origin: options.allowedOrigins ?? '*' }));

  app.onError((err: Error, c: Context) => {
    logger.error({ err, url: c.req.url, method: c.req.method }, 'Unhandled error');

    return c.json(
      {
        success: false,
        error: 'Internal Server Error',
        code: 'INTERNAL_ERROR',
        timestamp: new Date().toISOString(),
      },
      500
    );
  });

  app.notFound((c: Context) => handleNotFoundError(c, 'Route'));

  app.get('/', (c: Context) =>
    c.json({
      service: SERVICE_NAME,
      version: APP_VERSION,
      endpoints: ENDPOINTS,
    })
  );

  /**
   * GET /health - Health Check
   */
  app.get('/health', (c: Context) =>
    c.json({
      status: 'ok',
      service: SERVICE_NAME,
      version: APP_VERSION,
      storage: services.store.kind,
      reasoning: services.reasoning.isAvailable(),
      queue_depth: services.queue.depth(),
      config: getConfigStatus(),
      timestamp: new Date().toISOString(),
    })
  );

  app.route('/', createTelemetryRouter(services));
  app.route('/', createAnalysisRouter(services));
  app.route('/', createAlertsRouter(services));
  app.route('/', createDevicesRouter(services));
  app.route('/', createSimulatorRouter(services));

  return app;
}
