/**
 * Analysis Queue
 *
 * Single-consumer work queue for trend cycles. Jobs run one at a time.
 * A device has at most one job queued or running; further requests for it
 * are coalesced into the existing one.
 */

import { logger } from '../../lib/logger';

export type AnalysisJobReason = 'threshold' | 'manual';

export interface AnalysisJob {
  deviceId: string;
  reason: AnalysisJobReason;
  requestedAt: string;
}

export type EnqueueOutcome = 'queued' | 'coalesced';

export type AnalysisWorker = (job: AnalysisJob) => Promise<unknown>;

export class AnalysisQueue {
  private readonly pending: AnalysisJob[] = [];
  private active: AnalysisJob | null = null;
  private draining: Promise<void> | null = null;

  constructor(private readonly worker: AnalysisWorker) {}

  enqueue(job: AnalysisJob): EnqueueOutcome {
    if (this.isScheduled(job.deviceId)) {
      logger.debug({ deviceId: job.deviceId, reason: job.reason }, '[AnalysisQueue] Coalesced');
      return 'coalesced';
    }

    this.pending.push(job);
    logger.info({ deviceId: job.deviceId, reason: job.reason }, '[AnalysisQueue] Job queued');
    this.kick();
    return 'queued';
  }

  isScheduled(deviceId: string): boolean {
    return (
      this.active?.deviceId === deviceId || this.pending.some((job) => job.deviceId === deviceId)
    );
  }

  /** Queued plus running jobs */
  depth(): number {
    return this.pending.length + (this.active ? 1 : 0);
  }

  /** Resolves once every queued job has finished */
  async whenIdle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  private kick(): void {
    if (this.draining) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      if (this.pending.length > 0) this.kick();
    });
  }

  private async drain(): Promise<void> {
    let job = this.pending.shift();
    while (job) {
      this.active = job;
      try {
        await this.worker(job);
      } catch (error) {
        logger.error(
          { err: error, deviceId: job.deviceId, reason: job.reason },
          '[AnalysisQueue] Job failed'
        );
      } finally {
        this.active = null;
      }
      job = this.pending.shift();
    }
  }
}
