/**
 * Flow Statistics
 *
 * Window summaries for the analysis prompt and the 24h dashboard statistics.
 */

import type {
  FlowStatistics,
  HourlyFlow,
  Reading,
  WindowSummary,
} from '../../types/telemetry';
import type { TelemetryStore } from './telemetry-store-types';

const DAY_MS = 24 * 60 * 60 * 1000;

/** Reported while any flow is registered; the sensors expose no efficiency signal */
export const NOMINAL_EFFICIENCY = 95;

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Mean/max/min/count over a window. An empty window summarizes to zeros.
 */
export function summarizeWindow(readings: readonly Pick<Reading, 'value'>[]): WindowSummary {
  if (readings.length === 0) {
    return { mean: 0, max: 0, min: 0, count: 0 };
  }

  let sum = 0;
  let max = -Infinity;
  let min = Infinity;
  for (const { value } of readings) {
    sum += value;
    if (value > max) max = value;
    if (value < min) min = value;
  }

  return { mean: sum / readings.length, max, min, count: readings.length };
}

/** Groups by the UTC hour of each timestamp, ascending by hour */
export function groupByHour(readings: readonly Reading[]): HourlyFlow[] {
  const buckets = new Map<string, { sum: number; count: number }>();

  for (const reading of readings) {
    const date = new Date(reading.timestamp);
    if (Number.isNaN(date.getTime())) continue;
    const hour = String(date.getUTCHours()).padStart(2, '0');
    const bucket = buckets.get(hour) ?? { sum: 0, count: 0 };
    bucket.sum += reading.value;
    bucket.count += 1;
    buckets.set(hour, bucket);
  }

  return [...buckets.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([hour, { sum, count }]) => ({ hour, average: round2(sum / count), count }));
}

export function computeDailyStatistics(
  lastDay: readonly Reading[],
  totalCount: number,
  now: Date
): FlowStatistics {
  const summary = summarizeWindow(lastDay);

  return {
    average24h: round2(summary.mean),
    max24h: round2(summary.max),
    min24h: round2(summary.min),
    efficiency: summary.mean > 0 ? NOMINAL_EFFICIENCY : 0,
    perHourBreakdown: groupByHour(lastDay),
    totalCount,
    computedAt: now.toISOString(),
  };
}

/**
 * Computes the last-24h statistics and records a snapshot of them.
 */
export async function getFlowStatistics(
  store: TelemetryStore,
  deviceId?: string,
  now: Date = new Date()
): Promise<FlowStatistics> {
  const since = new Date(now.getTime() - DAY_MS).toISOString();
  const [lastDay, totalCount] = await Promise.all([
    store.listReadingsSince(since, deviceId),
    store.countReadings(deviceId),
  ]);

  const statistics = computeDailyStatistics(lastDay, totalCount, now);

  await store.insertStatisticsSnapshot({
    deviceId: deviceId ?? null,
    computedAt: statistics.computedAt,
    average: statistics.average24h,
    max: statistics.max24h,
    min: statistics.min24h,
    efficiency: statistics.efficiency,
  });

  return statistics;
}
