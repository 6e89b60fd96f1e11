import { describe, expect, it } from 'vitest';
import type { Reading } from '../../types/telemetry';
import {
  computeDailyStatistics,
  getFlowStatistics,
  groupByHour,
  round2,
  summarizeWindow,
} from './flow-statistics';
import { MemoryTelemetryStore } from './telemetry-store-memory';

function reading(id: number, value: number, timestamp: string, deviceId = 'default'): Reading {
  return { id, deviceId, value, timestamp, attachedAnalysis: null };
}

describe('summarizeWindow', () => {
  it('computes mean, max, min and count', () => {
    expect(summarizeWindow([{ value: 10 }, { value: 30 }, { value: 20 }])).toEqual({
      mean: 20,
      max: 30,
      min: 10,
      count: 3,
    });
  });

  it('summarizes an empty window to zeros', () => {
    expect(summarizeWindow([])).toEqual({ mean: 0, max: 0, min: 0, count: 0 });
  });
});

describe('groupByHour', () => {
  it('averages per UTC hour in ascending order', () => {
    expect(
      groupByHour([
        reading(1, 30, '2026-01-01T14:10:00.000Z'),
        reading(2, 10, '2026-01-01T09:05:00.000Z'),
        reading(3, 20, '2026-01-01T09:55:00.000Z'),
        reading(4, 11.2, '2026-01-01T14:20:00.000Z'),
      ])
    ).toEqual([
      { hour: '09', average: 15, count: 2 },
      { hour: '14', average: 20.6, count: 2 },
    ]);
  });

  it('skips unparseable timestamps', () => {
    expect(groupByHour([reading(1, 5, 'not a date')])).toEqual([]);
  });
});

describe('computeDailyStatistics', () => {
  const now = new Date('2026-01-02T00:00:00.000Z');

  it('reports nominal efficiency while flow is registered', () => {
    const stats = computeDailyStatistics(
      [reading(1, 10.005, '2026-01-01T12:00:00.000Z'), reading(2, 20, '2026-01-01T13:00:00.000Z')],
      40,
      now
    );

    expect(stats).toEqual({
      average24h: round2(15.0025),
      max24h: 20,
      min24h: round2(10.005),
      efficiency: 95,
      perHourBreakdown: [
        { hour: '12', average: round2(10.005), count: 1 },
        { hour: '13', average: 20, count: 1 },
      ],
      totalCount: 40,
      computedAt: '2026-01-02T00:00:00.000Z',
    });
  });

  it('reports zero efficiency without readings', () => {
    expect(computeDailyStatistics([], 0, now)).toMatchObject({
      average24h: 0,
      efficiency: 0,
      perHourBreakdown: [],
    });
  });
});

describe('getFlowStatistics', () => {
  it('uses only the last 24 hours and stores a snapshot', async () => {
    const store = new MemoryTelemetryStore();
    const now = new Date('2026-01-02T12:00:00.000Z');
    for (const [value, timestamp] of [
      [90, '2026-01-01T11:00:00.000Z'],
      [40, '2026-01-01T13:00:00.000Z'],
      [60, '2026-01-02T11:30:00.000Z'],
    ] as const) {
      await store.insertReading({ deviceId: 'default', value, timestamp, attachedAnalysis: null });
    }

    const stats = await getFlowStatistics(store, undefined, now);

    expect(stats.average24h).toBe(50);
    expect(stats.max24h).toBe(60);
    expect(stats.min24h).toBe(40);
    expect(stats.totalCount).toBe(3);
    expect(store.getStatisticsSnapshots()).toEqual([
      {
        deviceId: null,
        computedAt: '2026-01-02T12:00:00.000Z',
        average: 50,
        max: 60,
        min: 40,
        efficiency: 95,
      },
    ]);
  });

  it('scopes to one device', async () => {
    const store = new MemoryTelemetryStore();
    const now = new Date('2026-01-02T12:00:00.000Z');
    await store.insertReading({ deviceId: 'a', value: 10, timestamp: '2026-01-02T10:00:00.000Z', attachedAnalysis: null });
    await store.insertReading({ deviceId: 'b', value: 70, timestamp: '2026-01-02T10:00:00.000Z', attachedAnalysis: null });

    const stats = await getFlowStatistics(store, 'b', now);

    expect(stats.average24h).toBe(70);
    expect(stats.totalCount).toBe(1);
    expect(store.getStatisticsSnapshots()[0].deviceId).toBe('b');
  });
});
