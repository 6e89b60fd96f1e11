/**
 * Supabase (PostgreSQL) telemetry store.
 *
 * Tables are defined in supabase/migrations/0001_water_flow.sql.
 * supabase-js talks to PostgREST over HTTP, so each call is an independent request.
 */

import { createClient, type SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import { StorageFailureError } from '../../lib/errors';
import type { SupabaseConfig } from '../../lib/config-parser';
import type {
  Alert,
  AlertLevel,
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

const READING_COLUMNS = 'id, device_id, value, timestamp, attached_analysis';
const TREND_COLUMNS =
  'id, device_id, created_at, period_label, trend, recommendation, leak_probability, details';
const ALERT_COLUMNS = 'id, device_id, message, level, timestamp';
const DEVICE_CONFIG_COLUMNS = 'device_id, valve_auto_control, alert_threshold, reading_interval';
const DEVICE_STATUS_COLUMNS = 'device_id, online, last_seen, battery, firmware_version';

/** PostgREST caps a response at its max-rows setting (1000 by default) */
const DEFAULT_PAGE_SIZE = 1000;

/** timestamptz comes back as "2026-01-01T00:00:00+00:00"; normalize to toISOString() form */
const isoTimestamp = z.string().transform((value) => {
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? value : date.toISOString();
});

const ReadingRowSchema = z.object({
  id: z.coerce.number(),
  device_id: z.string(),
  value: z.coerce.number(),
  timestamp: isoTimestamp,
  attached_analysis: z.string().nullable(),
});

const TrendRowSchema = z.object({
  id: z.coerce.number(),
  device_id: z.string(),
  created_at: isoTimestamp,
  period_label: z.string(),
  trend: z.string(),
  recommendation: z.string(),
  leak_probability: z.coerce.number().nullable(),
  details: z.string().nullable(),
});

const AlertRowSchema = z.object({
  id: z.coerce.number(),
  device_id: z.string(),
  message: z.string(),
  level: z.union([z.literal(1), z.literal(2), z.literal(3)]),
  timestamp: isoTimestamp,
});

const DeviceConfigRowSchema = z.object({
  device_id: z.string(),
  valve_auto_control: z.boolean(),
  alert_threshold: z.coerce.number(),
  reading_interval: z.coerce.number().int(),
});

const DeviceStatusRowSchema = z.object({
  device_id: z.string(),
  online: z.boolean(),
  last_seen: isoTimestamp,
  battery: z.coerce.number().nullable(),
  firmware_version: z.string().nullable(),
});

const IdRowSchema = z.object({ id: z.coerce.number() });

interface PostgrestErrorLike {
  message: string;
  code?: string;
}

function toReading(row: z.infer<typeof ReadingRowSchema>): Reading {
  return {
    id: row.id,
    deviceId: row.device_id,
    value: row.value,
    timestamp: row.timestamp,
    attachedAnalysis: row.attached_analysis,
  };
}

function toTrendRow(row: z.infer<typeof TrendRowSchema>): StoredTrendRow {
  return {
    id: row.id,
    deviceId: row.device_id,
    createdAt: row.created_at,
    periodLabel: row.period_label,
    trend: row.trend,
    recommendation: row.recommendation,
    leakProbability: row.leak_probability ?? 0,
    details: row.details,
  };
}

function toAlert(row: z.infer<typeof AlertRowSchema>): Alert {
  const level: AlertLevel = row.level;
  return {
    id: row.id,
    deviceId: row.device_id,
    message: row.message,
    level,
    timestamp: row.timestamp,
  };
}

function toDeviceConfig(row: z.infer<typeof DeviceConfigRowSchema>): DeviceConfig {
  return {
    deviceId: row.device_id,
    valveAutoControl: row.valve_auto_control,
    alertThreshold: row.alert_threshold,
    readingInterval: row.reading_interval,
  };
}

function toDeviceStatus(row: z.infer<typeof DeviceStatusRowSchema>): DeviceStatus {
  return {
    deviceId: row.device_id,
    online: row.online,
    lastSeen: row.last_seen,
    battery: row.battery,
    firmwareVersion: row.firmware_version,
  };
}

export class SupabaseTelemetryStore implements TelemetryStore {
  readonly kind = 'supabase' as const;

  constructor(
    private readonly client: SupabaseClient,
    private readonly pageSize = DEFAULT_PAGE_SIZE
  ) {}

  static fromConfig(config: SupabaseConfig): SupabaseTelemetryStore {
    return new SupabaseTelemetryStore(
      createClient(config.url, config.serviceRoleKey, {
        auth: { persistSession: false, autoRefreshToken: false },
      })
    );
  }

  async insertReading(reading: NewReading): Promise<Reading> {
    const { data, error } = await this.client
      .from('flow_readings')
      .insert({
        device_id: reading.deviceId,
        value: reading.value,
        timestamp: reading.timestamp,
        attached_analysis: reading.attachedAnalysis,
      })
      .select(READING_COLUMNS)
      .single();

    this.assertOk('insert reading', error);
    return toReading(this.decode('insert reading', ReadingRowSchema, data));
  }

  async listReadings({ limit, offset = 0, deviceId }: ReadingQuery): Promise<Reading[]> {
    let query = this.client.from('flow_readings').select(READING_COLUMNS);
    if (deviceId !== undefined) {
      query = query.eq('device_id', deviceId);
    }

    const { data, error } = await query
      .order('timestamp', { ascending: false })
      .order('id', { ascending: false })
      .range(offset, offset + limit - 1);

    this.assertOk('list readings', error);
    return this.decode('list readings', z.array(ReadingRowSchema), data ?? []).map(toReading);
  }

  /** Pages through the window so the server's row cap never truncates it */
  async listReadingsSince(sinceIso: string, deviceId?: string): Promise<Reading[]> {
    const readings: Reading[] = [];

    for (let offset = 0; ; offset += this.pageSize) {
      let query = this.client.from('flow_readings').select(READING_COLUMNS).gt('timestamp', sinceIso);
      if (deviceId !== undefined) {
        query = query.eq('device_id', deviceId);
      }

      const { data, error } = await query
        .order('timestamp', { ascending: false })
        .order('id', { ascending: false })
        .range(offset, offset + this.pageSize - 1);

      this.assertOk('list readings since', error);
      const page = this.decode('list readings since', z.array(ReadingRowSchema), data ?? []);
      readings.push(...page.map(toReading));
      if (page.length < this.pageSize) {
        return readings;
      }
    }
  }

  async countReadings(deviceId?: string): Promise<number> {
    let query = this.client.from('flow_readings').select('id', { count: 'exact', head: true });
    if (deviceId !== undefined) {
      query = query.eq('device_id', deviceId);
    }

    const { count, error } = await query;
    this.assertOk('count readings', error);
    return count ?? 0;
  }

  async insertTrend(row: NewStoredTrendRow): Promise<number> {
    const { data, error } = await this.client
      .from('trend_analyses')
      .insert({
        device_id: row.deviceId,
        created_at: row.createdAt,
        period_label: row.periodLabel,
        trend: row.trend,
        recommendation: row.recommendation,
        leak_probability: row.leakProbability,
        details: row.details,
      })
      .select('id')
      .single();

    this.assertOk('insert trend', error);
    return this.decode('insert trend', IdRowSchema, data).id;
  }

  async listTrends({ limit, deviceId }: RecentQuery): Promise<StoredTrendRow[]> {
    let query = this.client.from('trend_analyses').select(TREND_COLUMNS);
    if (deviceId !== undefined) {
      query = query.eq('device_id', deviceId);
    }

    const { data, error } = await query
      .order('created_at', { ascending: false })
      .order('id', { ascending: false })
      .limit(limit);

    this.assertOk('list trends', error);
    return this.decode('list trends', z.array(TrendRowSchema), data ?? []).map(toTrendRow);
  }

  async insertStatisticsSnapshot(snapshot: StatisticsSnapshot): Promise<void> {
    const { error } = await this.client.from('flow_statistics').insert({
      device_id: snapshot.deviceId,
      computed_at: snapshot.computedAt,
      average_flow: snapshot.average,
      max_flow: snapshot.max,
      min_flow: snapshot.min,
      efficiency: snapshot.efficiency,
    });

    this.assertOk('insert statistics snapshot', error);
  }

  async insertAlert(alert: NewAlert): Promise<Alert> {
    const { data, error } = await this.client
      .from('alerts')
      .insert({
        device_id: alert.deviceId,
        message: alert.message,
        level: alert.level,
        timestamp: alert.timestamp,
      })
      .select(ALERT_COLUMNS)
      .single();

    this.assertOk('insert alert', error);
    return toAlert(this.decode('insert alert', AlertRowSchema, data));
  }

  async listAlerts({ limit, deviceId }: RecentQuery): Promise<Alert[]> {
    let query = this.client.from('alerts').select(ALERT_COLUMNS);
    if (deviceId !== undefined) {
      query = query.eq('device_id', deviceId);
    }

    const { data, error } = await query.order('timestamp', { ascending: false }).limit(limit);

    this.assertOk('list alerts', error);
    return this.decode('list alerts', z.array(AlertRowSchema), data ?? []).map(toAlert);
  }

  async getDeviceConfig(deviceId: string): Promise<DeviceConfig | null> {
    const { data, error } = await this.client
      .from('device_config')
      .select(DEVICE_CONFIG_COLUMNS)
      .eq('device_id', deviceId)
      .maybeSingle();

    this.assertOk('get device config', error);
    return data === null ? null : toDeviceConfig(this.decode('get device config', DeviceConfigRowSchema, data));
  }

  async saveDeviceConfig(config: DeviceConfig): Promise<DeviceConfig> {
    const { data, error } = await this.client
      .from('device_config')
      .upsert(
        {
          device_id: config.deviceId,
          valve_auto_control: config.valveAutoControl,
          alert_threshold: config.alertThreshold,
          reading_interval: config.readingInterval,
        },
        { onConflict: 'device_id' }
      )
      .select(DEVICE_CONFIG_COLUMNS)
      .single();

    this.assertOk('save device config', error);
    return toDeviceConfig(this.decode('save device config', DeviceConfigRowSchema, data));
  }

  async listDeviceConfigs(): Promise<DeviceConfig[]> {
    const { data, error } = await this.client
      .from('device_config')
      .select(DEVICE_CONFIG_COLUMNS)
      .order('device_id', { ascending: true });

    this.assertOk('list device configs', error);
    return this.decode('list device configs', z.array(DeviceConfigRowSchema), data ?? []).map(
      toDeviceConfig
    );
  }

  async recordDeviceContact({ deviceId, lastSeen }: DeviceContact): Promise<void> {
    // Columns left out of the upsert keep their stored values on conflict
    const { error } = await this.client
      .from('device_status')
      .upsert({ device_id: deviceId, online: true, last_seen: lastSeen }, { onConflict: 'device_id' });

    this.assertOk('record device contact', error);
  }

  async listDeviceStatuses(): Promise<DeviceStatus[]> {
    const { data, error } = await this.client
      .from('device_status')
      .select(DEVICE_STATUS_COLUMNS)
      .order('device_id', { ascending: true });

    this.assertOk('list device statuses', error);
    return this.decode('list device statuses', z.array(DeviceStatusRowSchema), data ?? []).map(
      toDeviceStatus
    );
  }

  private assertOk(operation: string, error: PostgrestErrorLike | null): void {
    if (error) {
      throw new StorageFailureError(operation, error.message, { cause: error });
    }
  }

  private decode<T extends z.ZodTypeAny>(operation: string, schema: T, data: unknown): z.infer<T> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new StorageFailureError(operation, `unexpected row shape (${parsed.error.message})`);
    }
    return parsed.data;
  }
}
