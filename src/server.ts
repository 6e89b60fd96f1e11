/**
 * Water Flow Monitor Server
 *
 * Loads configuration, wires storage and reasoning, and starts the Hono app
 * on @hono/node-server.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from './app';
import {
  getAnalysisSettings,
  getDeviceDefaults,
  getGeminiApiKey,
  getGeminiModelId,
  getServerSettings,
  logConfigStatus,
} from './lib/config-parser';
import { logger } from './lib/logger';
import { registerGracefulShutdownHandlers } from './server-shutdown';
import { createServices } from './services/container';
import { GeminiReasoningClient } from './services/reasoning/reasoning-client';
import { createTelemetryStore } from './services/telemetry/telemetry-store';

logConfigStatus();

const services = createServices({
  store: createTelemetryStore(),
  reasoning: new GeminiReasoningClient({
    apiKey: getGeminiApiKey(),
    modelId: getGeminiModelId(),
  }),
  analysis: getAnalysisSettings(),
  deviceDefaults: getDeviceDefaults(),
});

const settings = getServerSettings();
const app = createApp(services, { allowedOrigins: settings.allowedOrigins });

logger.info({ port: settings.port }, 'Water Flow Monitor starting');

const server = serve(
  {
    fetch: app.fetch,
    port: settings.port,
    hostname: settings.host,
  },
  (info: { address: string; port: number }) => {
    logger.info({ address: info.address, port: info.port }, 'Server listening');
  }
);

registerGracefulShutdownHandlers({
  queue: services.queue,
  close: () =>
    new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => (err ? reject(err) : resolve()));
    }),
});
