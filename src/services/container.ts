/**
 * Wires the analysis services together around one store and one reasoning client.
 */

import type { AnalysisSettings, DeviceDefaults } from '../lib/config-parser';
import { AnalysisPipeline } from './analysis/analysis-pipeline';
import { AnalysisQueue } from './analysis/analysis-queue';
import { TrendRecorder } from './analysis/trend-recorder';
import { TriggerRegistry } from './analysis/trigger-controller';
import { ANALYSIS_GENERATION_CONFIG, type ReasoningClient } from './reasoning/reasoning-client';
import { IngestionService } from './telemetry/ingestion-service';
import type { TelemetryStore } from './telemetry/telemetry-store-types';

export interface AppServices {
  store: TelemetryStore;
  reasoning: ReasoningClient;
  triggers: TriggerRegistry;
  recorder: TrendRecorder;
  pipeline: AnalysisPipeline;
  queue: AnalysisQueue;
  ingestion: IngestionService;
  now: () => Date;
}

export interface ServiceOptions {
  store: TelemetryStore;
  reasoning: ReasoningClient;
  analysis: AnalysisSettings;
  deviceDefaults: DeviceDefaults;
  now?: () => Date;
}

export function createServices(options: ServiceOptions): AppServices {
  const { store, reasoning, analysis } = options;
  const now = options.now ?? (() => new Date());
  const triggers = new TriggerRegistry(analysis.threshold);
  const recorder = new TrendRecorder(store, now);
  const pipeline = new AnalysisPipeline({
    store,
    reasoning,
    recorder,
    triggers,
    options: {
      windowSize: analysis.windowSize,
      minReadings: analysis.minReadings,
      listingLimit: analysis.listingLimit,
      generationConfig: { ...ANALYSIS_GENERATION_CONFIG, temperature: analysis.temperature },
    },
  });
  const queue = new AnalysisQueue((job) => pipeline.runCycle(job.deviceId));
  const ingestion = new IngestionService({
    store,
    triggers,
    queue,
    deviceDefaults: options.deviceDefaults,
    now,
  });

  return { store, reasoning, triggers, recorder, pipeline, queue, ingestion, now };
}
