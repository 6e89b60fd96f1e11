import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleApiError, handleValidationError, jsonSuccess, jsonSuccessData } from '../lib/error-handler';
import { logger } from '../lib/logger';
import type { AppServices } from '../services/container';
import { DEFAULT_DEVICE_ID } from '../types/telemetry';
import { DeviceIdSchema, parseWith } from './request-utils';
import { toAlertResponse } from './serializers';

const AlertsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  device_id: DeviceIdSchema.optional(),
});

const AlertBodySchema = z.object({
  device_id: DeviceIdSchema.optional(),
  message: z.string().trim().min(1).max(500),
  level: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  timestamp: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value).toISOString())
    .optional(),
});

export function createAlertsRouter(services: AppServices): Hono {
  const router = new Hono();

  // GET /alerts - threshold and device alerts, newest first
  router.get('/alerts', async (c: Context) => {
    try {
      const parsed = parseWith(AlertsQuerySchema, c.req.query());
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }
      const alerts = await services.store.listAlerts({
        limit: parsed.data.limit,
        deviceId: parsed.data.device_id,
      });
      return jsonSuccessData(c, alerts.map(toAlertResponse));
    } catch (error) {
      return handleApiError(c, error, 'Alerts');
    }
  });

  // POST /alerts - alert raised by the device itself
  router.post('/alerts', async (c: Context) => {
    try {
      const parsed = parseWith(AlertBodySchema, await c.req.json());
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }

      const alert = await services.store.insertAlert({
        deviceId: parsed.data.device_id ?? DEFAULT_DEVICE_ID,
        message: parsed.data.message,
        level: parsed.data.level,
        timestamp: parsed.data.timestamp ?? services.now().toISOString(),
      });

      logger.info({ deviceId: alert.deviceId, level: alert.level }, '[Alerts] Device alert stored');
      return jsonSuccess(c, { alert_id: alert.id });
    } catch (error) {
      return handleApiError(c, error, 'Alerts');
    }
  });

  return router;
}
