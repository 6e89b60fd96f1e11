/**
 * Telemetry Routes
 *
 * Reading ingestion, history listing and 24h flow statistics.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleApiError, handleValidationError, jsonSuccess, jsonSuccessData } from '../lib/error-handler';
import { logger } from '../lib/logger';
import type { AppServices } from '../services/container';
import { getFlowStatistics } from '../services/telemetry/flow-statistics';
import { DEFAULT_DEVICE_ID } from '../types/telemetry';
import { DeviceIdSchema, parseWith } from './request-utils';
import { toReadingResponse, toStatisticsResponse } from './serializers';

const FlowBodySchema = z.object({
  value: z.number().finite(),
  device_id: DeviceIdSchema.optional(),
});

function listingQuerySchema(defaultLimit: number) {
  return z.object({
    limit: z.coerce.number().int().min(1).max(1000).default(defaultLimit),
    offset: z.coerce.number().int().min(0).default(0),
    device_id: DeviceIdSchema.optional(),
  });
}

const HistoryQuerySchema = listingQuerySchema(100);
const LatestQuerySchema = listingQuerySchema(10);

const StatisticsQuerySchema = z.object({
  device_id: DeviceIdSchema.optional(),
});

export function createTelemetryRouter(services: AppServices): Hono {
  const router = new Hono();

  /**
   * POST /flow - store one reading; may schedule a background trend cycle.
   * The reply tells the device what to do next.
   */
  router.post('/flow', async (c: Context) => {
    try {
      const parsed = parseWith(FlowBodySchema, await c.req.json());
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }

      const deviceId = parsed.data.device_id ?? DEFAULT_DEVICE_ID;
      const receipt = await services.ingestion.ingest({ value: parsed.data.value, deviceId });

      logger.info(
        {
          deviceId,
          recordId: receipt.reading.id,
          sinceLastAnalysis: receipt.trigger.recordsSinceLastAnalysis,
        },
        '[Flow] Reading stored'
      );

      return jsonSuccess(c, {
        message: 'Reading stored',
        value: receipt.reading.value,
        record_id: receipt.reading.id,
        timestamp: receipt.reading.timestamp,
        device_id: deviceId,
        analysis_scheduled: receipt.analysisScheduled,
        valve_command: receipt.valveCommand,
        reading_interval: receipt.config.readingInterval,
        server_time: services.now().toISOString(),
        ...(receipt.warnings.length > 0 && { warnings: receipt.warnings }),
      });
    } catch (error) {
      return handleApiError(c, error, 'Flow');
    }
  });

  const listReadings = (schema: typeof HistoryQuerySchema, context: string) =>
    async (c: Context) => {
      try {
        const parsed = parseWith(schema, c.req.query());
        if (!parsed.ok) {
          return handleValidationError(c, parsed.message);
        }
        const readings = await services.store.listReadings({
          limit: parsed.data.limit,
          offset: parsed.data.offset,
          deviceId: parsed.data.device_id,
        });
        return jsonSuccessData(c, readings.map(toReadingResponse));
      } catch (error) {
        return handleApiError(c, error, context);
      }
    };

  router.get('/history', listReadings(HistoryQuerySchema, 'History'));
  router.get('/latest', listReadings(LatestQuerySchema, 'Latest'));

  /**
   * GET /statistics - 24h summary with per-hour breakdown; stores a snapshot
   */
  router.get('/statistics', async (c: Context) => {
    try {
      const parsed = parseWith(StatisticsQuerySchema, c.req.query());
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }
      const statistics = await getFlowStatistics(
        services.store,
        parsed.data.device_id,
        services.now()
      );
      return jsonSuccessData(c, toStatisticsResponse(statistics));
    } catch (error) {
      return handleApiError(c, error, 'Statistics');
    }
  });

  return router;
}
