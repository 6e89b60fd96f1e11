import { describe, expect, it, vi } from 'vitest';

vi.mock('../../lib/logger', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

import { MemoryTelemetryStore } from '../telemetry/telemetry-store-memory';
import { TrendRecorder, deserializeDetails, serializeDetails } from './trend-recorder';

const fixedNow = () => new Date('2026-03-01T12:00:00.000Z');

describe('TrendRecorder', () => {
  it('stores details as JSON text and decodes them on read', async () => {
    const store = new MemoryTelemetryStore();
    const recorder = new TrendRecorder(store, fixedNow);

    const id = await recorder.save(
      {
        trend: 'decreasing',
        leakProbability: 12.5,
        recommendation: 'Inspect the main line',
        details: { anomalies: ['drop at 03:00'], explanation: 'steady decline' },
        periodLabel: 'last 50 records',
      },
      'pump-1'
    );

    const [row] = await store.listTrends({ limit: 1 });
    expect(row.details).toBe('{"anomalies":["drop at 03:00"],"explanation":"steady decline"}');

    expect(await recorder.latest(5, 'pump-1')).toEqual([
      {
        id,
        deviceId: 'pump-1',
        createdAt: '2026-03-01T12:00:00.000Z',
        periodLabel: 'last 50 records',
        trend: 'decreasing',
        leakProbability: 12.5,
        recommendation: 'Inspect the main line',
        details: { anomalies: ['drop at 03:00'], explanation: 'steady decline' },
      },
    ]);
  });

  it('returns newest first and honours the limit', async () => {
    const store = new MemoryTelemetryStore();
    let tick = 0;
    const recorder = new TrendRecorder(store, () => new Date(Date.UTC(2026, 0, 1, 0, tick++)));
    for (const trend of ['stable', 'increasing', 'fluctuating'] as const) {
      await recorder.save(
        { trend, leakProbability: 0, recommendation: 'r', details: {}, periodLabel: 'p' },
        'default'
      );
    }

    const latest = await recorder.latest(2);
    expect(latest.map((t) => t.trend)).toEqual(['fluctuating', 'increasing']);
  });

  it('normalizes rows written by other producers', async () => {
    const store = new MemoryTelemetryStore();
    await store.insertTrend({
      deviceId: 'default',
      createdAt: '2026-01-01T00:00:00.000Z',
      periodLabel: 'manual',
      trend: 'SIDEWAYS',
      recommendation: 'n/a',
      leakProbability: 180,
      details: 'not json',
    });

    const [result] = await new TrendRecorder(store).latest(1);
    expect(result.trend).toBe('unknown');
    expect(result.leakProbability).toBe(100);
    expect(result.details).toEqual({});
  });
});

describe('details serialization', () => {
  it('round-trips a nested mapping', () => {
    const details = { identified_patterns: ['night usage'], nested: { level: 2 } };
    expect(deserializeDetails(serializeDetails(details))).toEqual(details);
  });

  it.each([null, '', '[1,2]', '"text"'])('reads %j as an empty mapping', (payload) => {
    expect(deserializeDetails(payload)).toEqual({});
  });
});
