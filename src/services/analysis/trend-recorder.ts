/**
 * Trend Recorder
 *
 * Persists interpreted trend results with `details` serialized as JSON text,
 * and reads them back decoded.
 */

import { logger } from '../../lib/logger';
import { coerceDetails, coerceProbability, coerceTrend } from './response-interpreter';
import type { PendingTrendResult, TrendDetails, TrendResult } from '../../types/telemetry';
import type { StoredTrendRow, TelemetryStore } from '../telemetry/telemetry-store-types';

export function serializeDetails(details: TrendDetails): string {
  return JSON.stringify(details);
}

/** Null, empty or undecodable payloads read back as an empty mapping */
export function deserializeDetails(payload: string | null): TrendDetails {
  if (!payload) return {};
  try {
    return coerceDetails(JSON.parse(payload));
  } catch (error) {
    logger.warn('[TrendRecorder] Stored details are not valid JSON', error);
    return {};
  }
}

function toTrendResult(row: StoredTrendRow): TrendResult {
  return {
    id: row.id,
    deviceId: row.deviceId,
    createdAt: row.createdAt,
    periodLabel: row.periodLabel,
    trend: coerceTrend(row.trend),
    recommendation: row.recommendation,
    leakProbability: coerceProbability(row.leakProbability),
    details: deserializeDetails(row.details),
  };
}

export class TrendRecorder {
  constructor(
    private readonly store: TelemetryStore,
    private readonly now: () => Date = () => new Date()
  ) {}

  async save(result: PendingTrendResult, deviceId: string): Promise<number> {
    return this.store.insertTrend({
      deviceId,
      createdAt: this.now().toISOString(),
      periodLabel: result.periodLabel,
      trend: result.trend,
      recommendation: result.recommendation,
      leakProbability: result.leakProbability,
      details: serializeDetails(result.details),
    });
  }

  /** Newest first */
  async latest(limit: number, deviceId?: string): Promise<TrendResult[]> {
    const rows = await this.store.listTrends({ limit, deviceId });
    return rows.map(toTrendResult);
  }
}
