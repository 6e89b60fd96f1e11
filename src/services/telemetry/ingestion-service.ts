/**
 * Reading ingestion: persist, count, schedule, then device bookkeeping.
 *
 * Once the reading is stored it is counted and the caller gets a receipt.
 * Failures in the follow-up writes (device config, contact, alert) are logged
 * and reported on the receipt instead of failing the ingestion.
 * Analysis runs on the queue; its outcome never reaches the ingesting caller.
 */

import type { DeviceDefaults } from '../../lib/config-parser';
import { getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { Alert, DeviceConfig, Reading, ValveCommand } from '../../types/telemetry';
import type { AnalysisQueue } from '../analysis/analysis-queue';
import type { TriggerRegistry, TriggerState } from '../analysis/trigger-controller';
import type { TelemetryStore } from './telemetry-store-types';

export interface IngestionRequest {
  value: number;
  deviceId: string;
}

export interface IngestionReceipt {
  reading: Reading;
  trigger: TriggerState;
  config: DeviceConfig;
  alert: Alert | null;
  valveCommand: ValveCommand;
  analysisScheduled: boolean;
  /** Follow-up writes that failed after the reading was stored */
  warnings: string[];
}

export interface IngestionServiceDeps {
  store: TelemetryStore;
  triggers: TriggerRegistry;
  queue: AnalysisQueue;
  /** Config given to a device on first contact */
  deviceDefaults: DeviceDefaults;
  now?: () => Date;
}

export function criticalLevelMessage(value: number): string {
  return `Critical flow level: ${value}%`;
}

export function valveCommandFor(value: number, config: DeviceConfig): ValveCommand {
  return config.valveAutoControl && value > config.alertThreshold ? 'close' : 'no_change';
}

export class IngestionService {
  private readonly now: () => Date;

  constructor(private readonly deps: IngestionServiceDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async ingest({ value, deviceId }: IngestionRequest): Promise<IngestionReceipt> {
    const timestamp = this.now().toISOString();
    const reading = await this.deps.store.insertReading({
      deviceId,
      value,
      timestamp,
      attachedAnalysis: null,
    });

    const trigger = this.deps.triggers.get(deviceId).recordIngested();
    let analysisScheduled = false;
    if (trigger.analysisPending) {
      const outcome = this.deps.queue.enqueue({
        deviceId,
        reason: 'threshold',
        requestedAt: timestamp,
      });
      analysisScheduled = outcome === 'queued';
    }

    const warnings: string[] = [];
    const attempt = async <T>(operation: string, run: () => Promise<T>): Promise<T | null> => {
      try {
        return await run();
      } catch (error) {
        logger.error({ err: error, deviceId, recordId: reading.id }, `[Ingestion] ${operation} failed`);
        warnings.push(`${operation} failed: ${getErrorMessage(error)}`);
        return null;
      }
    };

    const config =
      (await attempt('device config lookup', () => this.resolveConfig(deviceId))) ??
      this.defaultConfig(deviceId);

    await attempt('device contact', () =>
      this.deps.store.recordDeviceContact({ deviceId, lastSeen: timestamp })
    );

    let alert: Alert | null = null;
    if (value > config.alertThreshold) {
      alert = await attempt('alert insert', () =>
        this.deps.store.insertAlert({
          deviceId,
          message: criticalLevelMessage(value),
          level: 3,
          timestamp,
        })
      );
      if (alert) {
        logger.warn(
          { deviceId, value, alertThreshold: config.alertThreshold },
          '[Ingestion] Critical level alert raised'
        );
      }
    }

    return {
      reading,
      trigger,
      config,
      alert,
      valveCommand: valveCommandFor(value, config),
      analysisScheduled,
      warnings,
    };
  }

  /** Stored config, or the defaults saved for a device seen for the first time */
  private async resolveConfig(deviceId: string): Promise<DeviceConfig> {
    const existing = await this.deps.store.getDeviceConfig(deviceId);
    if (existing) {
      return existing;
    }
    logger.info({ deviceId }, '[Ingestion] New device, saving default config');
    return this.deps.store.saveDeviceConfig(this.defaultConfig(deviceId));
  }

  private defaultConfig(deviceId: string): DeviceConfig {
    return { deviceId, ...this.deps.deviceDefaults };
  }
}
