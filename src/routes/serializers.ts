/**
 * Wire (snake_case) representations of the domain types.
 */

import type {
  Alert,
  DeviceConfig,
  DeviceStatus,
  FlowStatistics,
  Reading,
  TrendResult,
} from '../types/telemetry';

export function toReadingResponse(reading: Reading) {
  return {
    id: reading.id,
    device_id: reading.deviceId,
    value: reading.value,
    timestamp: reading.timestamp,
    attached_analysis: reading.attachedAnalysis,
  };
}

export function toTrendResponse(trend: TrendResult) {
  return {
    id: trend.id,
    device_id: trend.deviceId,
    created_at: trend.createdAt,
    period_label: trend.periodLabel,
    trend: trend.trend,
    leak_probability: trend.leakProbability,
    recommendation: trend.recommendation,
    details: trend.details,
  };
}

export function toAlertResponse(alert: Alert) {
  return {
    id: alert.id,
    device_id: alert.deviceId,
    message: alert.message,
    level: alert.level,
    timestamp: alert.timestamp,
  };
}

export function toStatisticsResponse(statistics: FlowStatistics) {
  return {
    average_24h: statistics.average24h,
    max_24h: statistics.max24h,
    min_24h: statistics.min24h,
    efficiency: statistics.efficiency,
    per_hour_breakdown: statistics.perHourBreakdown,
    total_count: statistics.totalCount,
    computed_at: statistics.computedAt,
  };
}

export function toDeviceConfigResponse(config: DeviceConfig) {
  return {
    device_id: config.deviceId,
    valve_auto_control: config.valveAutoControl,
    alert_threshold: config.alertThreshold,
    reading_interval: config.readingInterval,
  };
}

export function toDeviceStatusResponse(status: DeviceStatus) {
  return {
    device_id: status.deviceId,
    online: status.online,
    last_seen: status.lastSeen,
    battery: status.battery,
    firmware_version: status.firmwareVersion,
  };
}
