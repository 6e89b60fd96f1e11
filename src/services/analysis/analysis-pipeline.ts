/**
 * Analysis Pipeline
 *
 * One trend cycle for one device:
 * recent window -> minimum-data guard -> summary -> prompt -> reasoning
 * -> interpretation -> persistence -> trigger reset.
 *
 * The data guard aborts without touching the trigger, so the device stays
 * primed. Every path past the guard resets the trigger.
 */

import { InsufficientDataError, ServiceUnavailableError, getErrorMessage } from '../../lib/errors';
import { createChildLogger } from '../../lib/logger';
import type {
  GenerationConfig,
  PendingTrendResult,
  TrendAssessment,
} from '../../types/telemetry';
import type { ReasoningClient } from '../reasoning/reasoning-client';
import { ANALYSIS_GENERATION_CONFIG } from '../reasoning/reasoning-client';
import { summarizeWindow } from '../telemetry/flow-statistics';
import type { TelemetryStore } from '../telemetry/telemetry-store-types';
import { buildAnalysisPrompt, DEFAULT_LISTING_LIMIT } from './prompt-builder';
import { decodeTrendResponse } from './response-interpreter';
import type { TrendRecorder } from './trend-recorder';
import type { TriggerRegistry } from './trigger-controller';

const log = createChildLogger({ module: 'analysis-pipeline' });

export interface AnalysisPipelineOptions {
  /** Readings fetched per cycle */
  windowSize: number;
  /** Below this many stored readings the cycle is aborted */
  minReadings: number;
  /** Readings listed verbatim in the prompt */
  listingLimit: number;
  generationConfig: GenerationConfig;
}

export const DEFAULT_PIPELINE_OPTIONS: AnalysisPipelineOptions = {
  windowSize: 50,
  minReadings: 5,
  listingLimit: DEFAULT_LISTING_LIMIT,
  generationConfig: ANALYSIS_GENERATION_CONFIG,
};

export type AnalysisOutcome =
  | {
      status: 'completed';
      recordId: number;
      result: PendingTrendResult;
      /** Fallback or error assessment rather than a parsed one */
      degraded: boolean;
    }
  | { status: 'insufficient_data'; available: number; required: number; message: string }
  | { status: 'service_unavailable'; message: string };

export interface AnalysisPipelineDeps {
  store: TelemetryStore;
  reasoning: ReasoningClient;
  recorder: TrendRecorder;
  triggers: TriggerRegistry;
  options?: Partial<AnalysisPipelineOptions>;
}

export function periodLabelFor(count: number): string {
  return `last ${count} records`;
}

export function createErrorAssessment(error: unknown): TrendAssessment {
  const message = getErrorMessage(error);
  return {
    trend: 'error',
    leakProbability: 0,
    recommendation: `Analysis error: ${message}`,
    details: { error: message },
  };
}

export class AnalysisPipeline {
  private readonly store: TelemetryStore;
  private readonly reasoning: ReasoningClient;
  private readonly recorder: TrendRecorder;
  private readonly triggers: TriggerRegistry;
  readonly options: AnalysisPipelineOptions;

  constructor(deps: AnalysisPipelineDeps) {
    this.store = deps.store;
    this.reasoning = deps.reasoning;
    this.recorder = deps.recorder;
    this.triggers = deps.triggers;
    this.options = { ...DEFAULT_PIPELINE_OPTIONS, ...deps.options };
  }

  /**
   * Fewer than `minReadings` stored for the device, or null when enough are available.
   */
  async checkDataAvailability(deviceId: string): Promise<InsufficientDataError | null> {
    const available = await this.store.countReadings(deviceId);
    return available < this.options.minReadings
      ? new InsufficientDataError(available, this.options.minReadings)
      : null;
  }

  async runCycle(deviceId: string): Promise<AnalysisOutcome> {
    const readings = await this.store.listReadings({
      limit: this.options.windowSize,
      deviceId,
    });

    if (readings.length < this.options.minReadings) {
      const shortage = new InsufficientDataError(readings.length, this.options.minReadings);
      log.warn({ deviceId, available: shortage.available }, `[Analysis] ${shortage.message}`);
      return {
        status: 'insufficient_data',
        available: shortage.available,
        required: shortage.required,
        message: shortage.message,
      };
    }

    const trigger = this.triggers.get(deviceId);
    try {
      const summary = summarizeWindow(readings);
      const prompt = buildAnalysisPrompt({
        readings,
        summary,
        listingLimit: this.options.listingLimit,
      });

      let assessment: TrendAssessment;
      let degraded: boolean;
      try {
        const rawText = await this.reasoning.generate(prompt, this.options.generationConfig);
        const interpretation = decodeTrendResponse(rawText);
        assessment = interpretation.assessment;
        degraded = interpretation.kind === 'fallback';
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          log.warn({ deviceId }, `[Analysis] Skipped: ${error.message}`);
          return { status: 'service_unavailable', message: error.message };
        }
        log.error({ err: error, deviceId }, '[Analysis] Reasoning call failed');
        assessment = createErrorAssessment(error);
        degraded = true;
      }

      const result: PendingTrendResult = {
        ...assessment,
        periodLabel: periodLabelFor(readings.length),
      };
      const recordId = await this.recorder.save(result, deviceId);

      log.info(
        { deviceId, recordId, trend: result.trend, degraded },
        '[Analysis] Trend cycle completed'
      );
      return { status: 'completed', recordId, result, degraded };
    } finally {
      trigger.markAnalysisComplete();
    }
  }
}
