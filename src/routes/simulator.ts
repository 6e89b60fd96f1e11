/**
 * Simulator Routes
 *
 * Generates one random reading per device and feeds it through normal ingestion,
 * so triggers, alerts and analysis behave exactly as for real telemetry.
 * Without explicit ids every configured device reports, or the default device
 * when none is configured yet.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { handleApiError, handleValidationError, jsonSuccessData } from '../lib/error-handler';
import { logger } from '../lib/logger';
import type { AppServices } from '../services/container';
import { simulateReadingValue } from '../services/simulator/reading-simulator';
import { DEFAULT_DEVICE_ID, type ValveCommand } from '../types/telemetry';
import { DeviceIdSchema, parseWith, readOptionalJson } from './request-utils';

interface GeneratedReading {
  device_id: string;
  record_id: number;
  value: number;
  timestamp: string;
  alert_raised: boolean;
  analysis_scheduled: boolean;
  valve_command: ValveCommand;
}

const GenerateBodySchema = z.object({
  device_ids: z.array(DeviceIdSchema).min(1).max(100).optional(),
});

async function configuredDeviceIds(services: AppServices): Promise<string[]> {
  const configs = await services.store.listDeviceConfigs();
  return configs.length > 0 ? configs.map((config) => config.deviceId) : [DEFAULT_DEVICE_ID];
}

export function createSimulatorRouter(
  services: AppServices,
  random: () => number = Math.random
): Hono {
  const router = new Hono();

  router.post('/simulator/generate', async (c: Context) => {
    try {
      const parsed = parseWith(GenerateBodySchema, await readOptionalJson(c));
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }

      const deviceIds = parsed.data.device_ids
        ? [...new Set(parsed.data.device_ids)]
        : await configuredDeviceIds(services);
      const generated: GeneratedReading[] = [];
      // Sequential so each device's trigger sees its readings in order
      for (const deviceId of deviceIds) {
        const receipt = await services.ingestion.ingest({
          value: simulateReadingValue(random),
          deviceId,
        });
        generated.push({
          device_id: deviceId,
          record_id: receipt.reading.id,
          value: receipt.reading.value,
          timestamp: receipt.reading.timestamp,
          alert_raised: receipt.alert !== null,
          analysis_scheduled: receipt.analysisScheduled,
          valve_command: receipt.valveCommand,
        });
      }

      logger.debug({ devices: deviceIds.length }, '[Simulator] Readings generated');
      return jsonSuccessData(c, generated);
    } catch (error) {
      return handleApiError(c, error, 'Simulator');
    }
  });

  return router;
}
