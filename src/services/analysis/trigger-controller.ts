/**
 * Analysis Trigger Controller
 *
 * Counts readings since the last analysis and flags when a new cycle is due.
 * One controller per device, owned by a TriggerRegistry.
 *
 * Transitions: increment -> threshold trip -> reset. Reset happens after every
 * completed cycle, successful or not, so a failing reasoning service is retried
 * once per `threshold` readings rather than on every reading.
 */

export const DEFAULT_ANALYSIS_THRESHOLD = 5;

export interface TriggerState {
  recordsSinceLastAnalysis: number;
  analysisPending: boolean;
}

export class AnalysisTriggerController {
  private recordsSinceLastAnalysis = 0;
  private analysisPending = false;
  readonly threshold: number;

  constructor(threshold: number = DEFAULT_ANALYSIS_THRESHOLD) {
    if (!Number.isInteger(threshold) || threshold < 1) {
      throw new RangeError(`Analysis threshold must be a positive integer, got ${threshold}`);
    }
    this.threshold = threshold;
  }

  recordIngested(): TriggerState {
    this.recordsSinceLastAnalysis += 1;
    if (this.recordsSinceLastAnalysis >= this.threshold) {
      this.analysisPending = true;
    }
    return this.getState();
  }

  needsAnalysis(): boolean {
    return this.analysisPending;
  }

  markAnalysisComplete(): void {
    this.recordsSinceLastAnalysis = 0;
    this.analysisPending = false;
  }

  getState(): TriggerState {
    return {
      recordsSinceLastAnalysis: this.recordsSinceLastAnalysis,
      analysisPending: this.analysisPending,
    };
  }
}

export class TriggerRegistry {
  private readonly controllers = new Map<string, AnalysisTriggerController>();

  constructor(private readonly threshold: number = DEFAULT_ANALYSIS_THRESHOLD) {}

  get(deviceId: string): AnalysisTriggerController {
    let controller = this.controllers.get(deviceId);
    if (!controller) {
      controller = new AnalysisTriggerController(this.threshold);
      this.controllers.set(deviceId, controller);
    }
    return controller;
  }

  snapshot(): Record<string, TriggerState> {
    const states: Record<string, TriggerState> = {};
    for (const [deviceId, controller] of this.controllers) {
      states[deviceId] = controller.getState();
    }
    return states;
  }
}
