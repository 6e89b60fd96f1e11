/**
 * Device Routes
 *
 * Registered devices with their last contact, and per-device configuration.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import {
  handleApiError,
  handleNotFoundError,
  handleValidationError,
  jsonSuccessData,
} from '../lib/error-handler';
import { logger } from '../lib/logger';
import type { AppServices } from '../services/container';
import { DeviceIdSchema, parseWith } from './request-utils';
import { toDeviceConfigResponse, toDeviceStatusResponse } from './serializers';

const DeviceParamSchema = z.object({ device_id: DeviceIdSchema });

const DeviceConfigBodySchema = z.object({
  // Optional; when present it must name the device in the path
  device_id: DeviceIdSchema.optional(),
  valve_auto_control: z.boolean(),
  alert_threshold: z.number().finite().min(0).max(100),
  reading_interval: z.number().int().min(1).max(86_400),
});

export function createDevicesRouter(services: AppServices): Hono {
  const router = new Hono();

  // GET /devices - every device that has reported, by id
  router.get('/devices', async (c: Context) => {
    try {
      const statuses = await services.store.listDeviceStatuses();
      return jsonSuccessData(c, statuses.map(toDeviceStatusResponse));
    } catch (error) {
      return handleApiError(c, error, 'Devices');
    }
  });

  router.get('/config/:device_id', async (c: Context) => {
    try {
      const params = parseWith(DeviceParamSchema, c.req.param());
      if (!params.ok) {
        return handleValidationError(c, params.message);
      }
      const config = await services.store.getDeviceConfig(params.data.device_id);
      if (!config) {
        return handleNotFoundError(c, 'Device');
      }
      return jsonSuccessData(c, toDeviceConfigResponse(config));
    } catch (error) {
      return handleApiError(c, error, 'Device Config');
    }
  });

  /**
   * PUT /config/:device_id - replace a device's config, creating it if absent
   */
  router.put('/config/:device_id', async (c: Context) => {
    try {
      const params = parseWith(DeviceParamSchema, c.req.param());
      if (!params.ok) {
        return handleValidationError(c, params.message);
      }
      const body = parseWith(DeviceConfigBodySchema, await c.req.json());
      if (!body.ok) {
        return handleValidationError(c, body.message);
      }

      const deviceId = params.data.device_id;
      if (body.data.device_id !== undefined && body.data.device_id !== deviceId) {
        return handleValidationError(c, 'device_id does not match the path');
      }

      const saved = await services.store.saveDeviceConfig({
        deviceId,
        valveAutoControl: body.data.valve_auto_control,
        alertThreshold: body.data.alert_threshold,
        readingInterval: body.data.reading_interval,
      });

      logger.info({ deviceId }, '[Device Config] Updated');
      return jsonSuccessData(c, toDeviceConfigResponse(saved));
    } catch (error) {
      return handleApiError(c, error, 'Device Config');
    }
  });

  return router;
}
