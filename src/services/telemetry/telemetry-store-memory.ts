/**
 * In-process telemetry store.
 * Used when Supabase is not configured, and by the tests.
 */

import type {
  Alert,
  DeviceConfig,
  DeviceStatus,
  NewAlert,
  NewReading,
  Reading,
} from '../../types/telemetry';
import type {
  DeviceContact,
  NewStoredTrendRow,
  ReadingQuery,
  RecentQuery,
  StatisticsSnapshot,
  StoredTrendRow,
  TelemetryStore,
} from './telemetry-store-types';

function newestFirst<T extends { id: number }>(
  rows: readonly T[],
  timeOf: (row: T) => string
): T[] {
  return [...rows].sort((a, b) => {
    const byTime = timeOf(b).localeCompare(timeOf(a));
    return byTime !== 0 ? byTime : b.id - a.id;
  });
}

function forDevice<T extends { deviceId: string }>(rows: readonly T[], deviceId?: string): T[] {
  return deviceId === undefined ? [...rows] : rows.filter((row) => row.deviceId === deviceId);
}

function byDeviceId<T extends { deviceId: string }>(rows: ReadonlyMap<string, T>): T[] {
  return [...rows.values()].sort((a, b) => a.deviceId.localeCompare(b.deviceId));
}

export class MemoryTelemetryStore implements TelemetryStore {
  readonly kind = 'memory' as const;

  private readonly readings: Reading[] = [];
  private readonly trends: StoredTrendRow[] = [];
  private readonly alerts: Alert[] = [];
  private readonly snapshots: StatisticsSnapshot[] = [];
  private readonly deviceConfigs = new Map<string, DeviceConfig>();
  private readonly deviceStatuses = new Map<string, DeviceStatus>();
  private nextReadingId = 1;
  private nextTrendId = 1;
  private nextAlertId = 1;

  async insertReading(reading: NewReading): Promise<Reading> {
    const stored: Reading = { ...reading, id: this.nextReadingId++ };
    this.readings.push(stored);
    return { ...stored };
  }

  async listReadings({ limit, offset = 0, deviceId }: ReadingQuery): Promise<Reading[]> {
    return newestFirst(forDevice(this.readings, deviceId), (r) => r.timestamp)
      .slice(offset, offset + limit)
      .map((r) => ({ ...r }));
  }

  async listReadingsSince(sinceIso: string, deviceId?: string): Promise<Reading[]> {
    return newestFirst(
      forDevice(this.readings, deviceId).filter((r) => r.timestamp > sinceIso),
      (r) => r.timestamp
    ).map((r) => ({ ...r }));
  }

  async countReadings(deviceId?: string): Promise<number> {
    return forDevice(this.readings, deviceId).length;
  }

  async insertTrend(row: NewStoredTrendRow): Promise<number> {
    const id = this.nextTrendId++;
    this.trends.push({ ...row, id });
    return id;
  }

  async listTrends({ limit, deviceId }: RecentQuery): Promise<StoredTrendRow[]> {
    return newestFirst(forDevice(this.trends, deviceId), (t) => t.createdAt)
      .slice(0, limit)
      .map((t) => ({ ...t }));
  }

  async insertStatisticsSnapshot(snapshot: StatisticsSnapshot): Promise<void> {
    this.snapshots.push({ ...snapshot });
  }

  async insertAlert(alert: NewAlert): Promise<Alert> {
    const stored: Alert = { ...alert, id: this.nextAlertId++ };
    this.alerts.push(stored);
    return { ...stored };
  }

  async listAlerts({ limit, deviceId }: RecentQuery): Promise<Alert[]> {
    return newestFirst(forDevice(this.alerts, deviceId), (a) => a.timestamp)
      .slice(0, limit)
      .map((a) => ({ ...a }));
  }

  async getDeviceConfig(deviceId: string): Promise<DeviceConfig | null> {
    const config = this.deviceConfigs.get(deviceId);
    return config ? { ...config } : null;
  }

  async saveDeviceConfig(config: DeviceConfig): Promise<DeviceConfig> {
    this.deviceConfigs.set(config.deviceId, { ...config });
    return { ...config };
  }

  async listDeviceConfigs(): Promise<DeviceConfig[]> {
    return byDeviceId(this.deviceConfigs).map((c) => ({ ...c }));
  }

  async recordDeviceContact({ deviceId, lastSeen }: DeviceContact): Promise<void> {
    const previous = this.deviceStatuses.get(deviceId);
    this.deviceStatuses.set(deviceId, {
      deviceId,
      online: true,
      lastSeen,
      battery: previous?.battery ?? null,
      firmwareVersion: previous?.firmwareVersion ?? null,
    });
  }

  async listDeviceStatuses(): Promise<DeviceStatus[]> {
    return byDeviceId(this.deviceStatuses).map((s) => ({ ...s }));
  }

  /** Snapshots recorded so far, oldest first */
  getStatisticsSnapshots(): StatisticsSnapshot[] {
    return this.snapshots.map((s) => ({ ...s }));
  }
}
