/**
 * Telemetry and trend analysis domain types.
 */

export const DEFAULT_DEVICE_ID = 'default';

export interface Reading {
  id: number;
  deviceId: string;
  /** Flow/level as a percentage */
  value: number;
  /** ISO-8601 */
  timestamp: string;
  attachedAnalysis: string | null;
}

export type NewReading = Omit<Reading, 'id'>;

export const TREND_LABELS = [
  'stable',
  'increasing',
  'decreasing',
  'fluctuating',
  'unknown',
  'error',
] as const;

export type TrendLabel = (typeof TREND_LABELS)[number];

export type TrendDetails = Record<string, unknown>;

/** What the response interpreter produces from one LLM answer */
export interface TrendAssessment {
  trend: TrendLabel;
  /** Always within [0, 100] */
  leakProbability: number;
  recommendation: string;
  details: TrendDetails;
}

export interface PendingTrendResult extends TrendAssessment {
  /** Window description such as "last 50 records" */
  periodLabel: string;
}

export interface TrendResult extends PendingTrendResult {
  id: number;
  deviceId: string;
  createdAt: string;
}

export interface GenerationConfig {
  /** 0.0-1.0 */
  temperature: number;
  topP: number;
  topK: number;
  maxOutputTokens: number;
}

export interface WindowSummary {
  mean: number;
  max: number;
  min: number;
  count: number;
}

export interface HourlyFlow {
  /** "00" - "23" (UTC) */
  hour: string;
  average: number;
  count: number;
}

export interface FlowStatistics {
  average24h: number;
  max24h: number;
  min24h: number;
  efficiency: number;
  perHourBreakdown: HourlyFlow[];
  totalCount: number;
  computedAt: string;
}

/** 1: informational, 2: warning, 3: critical */
export type AlertLevel = 1 | 2 | 3;

export interface Alert {
  id: number;
  deviceId: string;
  message: string;
  level: AlertLevel;
  timestamp: string;
}

export type NewAlert = Omit<Alert, 'id'>;

/** Per-device settings, created with defaults the first time a device reports */
export interface DeviceConfig {
  deviceId: string;
  /** Close the valve automatically when a reading exceeds the threshold */
  valveAutoControl: boolean;
  /** Readings strictly above this raise a critical alert */
  alertThreshold: number;
  /** Seconds between device reports */
  readingInterval: number;
}

export interface DeviceStatus {
  deviceId: string;
  online: boolean;
  lastSeen: string;
  battery: number | null;
  firmwareVersion: string | null;
}

/** Instruction returned to a device with each ingestion reply */
export type ValveCommand = 'close' | 'no_change';
