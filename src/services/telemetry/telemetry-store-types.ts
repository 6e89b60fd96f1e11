import type {
  Alert,
  DeviceConfig,
  DeviceStatus,
  NewAlert,
  NewReading,
  Reading,
  TrendLabel,
} from '../../types/telemetry';

/** Trend row as stored: `details` is serialized text */
export interface StoredTrendRow {
  id: number;
  deviceId: string;
  createdAt: string;
  periodLabel: string;
  trend: TrendLabel | string;
  recommendation: string;
  leakProbability: number;
  details: string | null;
}

export type NewStoredTrendRow = Omit<StoredTrendRow, 'id'>;

export interface StatisticsSnapshot {
  deviceId: string | null;
  computedAt: string;
  average: number;
  max: number;
  min: number;
  efficiency: number;
}

export interface ReadingQuery {
  limit: number;
  offset?: number;
  /** All devices when omitted */
  deviceId?: string;
}

export interface RecentQuery {
  limit: number;
  deviceId?: string;
}

export interface DeviceContact {
  deviceId: string;
  lastSeen: string;
}

/**
 * Telemetry storage. Readings, trends and alerts are append-only; device
 * config and status are keyed by device id. Listings are newest first.
 * Implementations throw StorageFailureError when the backend rejects an operation.
 */
export interface TelemetryStore {
  readonly kind: 'memory' | 'supabase';

  insertReading(reading: NewReading): Promise<Reading>;
  listReadings(query: ReadingQuery): Promise<Reading[]>;
  /** Readings with a timestamp strictly after `sinceIso` */
  listReadingsSince(sinceIso: string, deviceId?: string): Promise<Reading[]>;
  countReadings(deviceId?: string): Promise<number>;

  insertTrend(row: NewStoredTrendRow): Promise<number>;
  listTrends(query: RecentQuery): Promise<StoredTrendRow[]>;

  insertStatisticsSnapshot(snapshot: StatisticsSnapshot): Promise<void>;

  insertAlert(alert: NewAlert): Promise<Alert>;
  listAlerts(query: RecentQuery): Promise<Alert[]>;

  getDeviceConfig(deviceId: string): Promise<DeviceConfig | null>;
  /** Insert or replace the config for `config.deviceId` */
  saveDeviceConfig(config: DeviceConfig): Promise<DeviceConfig>;
  listDeviceConfigs(): Promise<DeviceConfig[]>;

  /** Marks the device online and updates last seen; battery and firmware are kept */
  recordDeviceContact(contact: DeviceContact): Promise<void>;
  /** Ordered by device id */
  listDeviceStatuses(): Promise<DeviceStatus[]>;
}
