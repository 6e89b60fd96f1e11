import { getSupabaseConfig } from '../../lib/config-parser';
import { logger } from '../../lib/logger';
import { MemoryTelemetryStore } from './telemetry-store-memory';
import { SupabaseTelemetryStore } from './telemetry-store-supabase';
import type { TelemetryStore } from './telemetry-store-types';

export type { TelemetryStore } from './telemetry-store-types';

/**
 * Supabase when configured, otherwise an in-memory store (data lost on restart).
 */
export function createTelemetryStore(): TelemetryStore {
  const config = getSupabaseConfig();
  if (!config) {
    logger.warn('[Storage] Supabase config missing, using in-memory telemetry store');
    return new MemoryTelemetryStore();
  }

  logger.info('[Storage] PostgreSQL persistence enabled');
  return SupabaseTelemetryStore.fromConfig(config);
}
