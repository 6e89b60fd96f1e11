/**
 * Analysis Routes
 *
 * Stored trend results, on-demand trend cycles, queue/trigger status and
 * streamed free-form analysis over SSE.
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { ServiceUnavailableError } from '../lib/errors';
import { handleApiError, handleValidationError, jsonSuccess, jsonSuccessData } from '../lib/error-handler';
import { logger } from '../lib/logger';
import { buildAnalysisPrompt, buildDirectPrompt } from '../services/analysis/prompt-builder';
import type { AppServices } from '../services/container';
import { STREAM_GENERATION_CONFIG } from '../services/reasoning/reasoning-client';
import { summarizeWindow } from '../services/telemetry/flow-statistics';
import { DEFAULT_DEVICE_ID } from '../types/telemetry';
import { DeviceIdSchema, parseWith, readOptionalJson } from './request-utils';
import { toTrendResponse } from './serializers';

const TrendsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(5),
  device_id: DeviceIdSchema.optional(),
});

const AnalyzeNowSchema = z.object({
  device_id: DeviceIdSchema.optional(),
});

const StreamBodySchema = z.object({
  question: z.string().trim().min(1).max(4000).optional(),
  device_id: DeviceIdSchema.optional(),
});

const SSE_HEADERS = {
  'Content-Type': 'text/event-stream',
  'Cache-Control': 'no-cache',
  Connection: 'keep-alive',
} as const;

export function sseTextFrame(text: string): string {
  return `data: ${JSON.stringify({ text })}\n\n`;
}

export const SSE_DONE_FRAME = 'data: [DONE]\n\n';

/**
 * SSE byte stream over a fragment generator. Fragments are pulled only as the
 * consumer reads; cancelling the response closes the generator.
 */
export function toEventStream(fragments: AsyncGenerator<string, void, void>): ReadableStream<Uint8Array> {
  const encoder = new TextEncoder();

  return new ReadableStream<Uint8Array>({
    async pull(controller) {
      for (;;) {
        const next = await fragments.next();
        if (next.done) {
          controller.enqueue(encoder.encode(SSE_DONE_FRAME));
          controller.close();
          return;
        }
        if (next.value) {
          controller.enqueue(encoder.encode(sseTextFrame(next.value)));
          return;
        }
      }
    },
    async cancel() {
      await fragments.return();
    },
  });
}

export function createAnalysisRouter(services: AppServices): Hono {
  const router = new Hono();

  /**
   * GET /trends - stored trend results, newest first
   */
  router.get('/trends', async (c: Context) => {
    try {
      const parsed = parseWith(TrendsQuerySchema, c.req.query());
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }
      const trends = await services.recorder.latest(parsed.data.limit, parsed.data.device_id);
      return jsonSuccessData(c, trends.map(toTrendResponse));
    } catch (error) {
      return handleApiError(c, error, 'Trends');
    }
  });

  /**
   * GET|POST /analyze-now - queue a trend cycle regardless of trigger state
   */
  const analyzeNow = async (c: Context) => {
    try {
      const input = c.req.method === 'POST' ? await readOptionalJson(c) : c.req.query();
      const parsed = parseWith(AnalyzeNowSchema, input);
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }
      const deviceId = parsed.data.device_id ?? DEFAULT_DEVICE_ID;

      const shortage = await services.pipeline.checkDataAvailability(deviceId);
      if (shortage) {
        return jsonSuccess(c, {
          status: 'insufficient_data',
          message: shortage.message,
          device_id: deviceId,
        });
      }

      if (!services.reasoning.isAvailable()) {
        throw new ServiceUnavailableError('Gemini', 'GEMINI_API_KEY not configured');
      }

      const outcome = services.queue.enqueue({
        deviceId,
        reason: 'manual',
        requestedAt: services.now().toISOString(),
      });

      return jsonSuccess(c, {
        status: outcome,
        message:
          outcome === 'queued'
            ? 'Analysis started in background'
            : 'Analysis already in progress for this device',
        device_id: deviceId,
      });
    } catch (error) {
      return handleApiError(c, error, 'Analyze Now');
    }
  };

  router.get('/analyze-now', analyzeNow);
  router.post('/analyze-now', analyzeNow);

  /**
   * GET /analysis/status - trigger counters per device and queue depth
   */
  router.get('/analysis/status', (c: Context) => {
    const triggers = Object.fromEntries(
      Object.entries(services.triggers.snapshot()).map(([deviceId, state]) => [
        deviceId,
        {
          records_since_last_analysis: state.recordsSinceLastAnalysis,
          analysis_pending: state.analysisPending,
        },
      ])
    );

    return jsonSuccess(c, {
      triggers,
      queue_depth: services.queue.depth(),
      reasoning_available: services.reasoning.isAvailable(),
    });
  });

  /**
   * POST /analysis/stream - streamed answer over the device's recent window.
   * Without a question, streams a trend analysis of the window instead.
   */
  router.post('/analysis/stream', async (c: Context) => {
    try {
      const parsed = parseWith(StreamBodySchema, await readOptionalJson(c));
      if (!parsed.ok) {
        return handleValidationError(c, parsed.message);
      }
      const deviceId = parsed.data.device_id ?? DEFAULT_DEVICE_ID;
      const { windowSize, listingLimit } = services.pipeline.options;

      const readings = await services.store.listReadings({ limit: windowSize, deviceId });
      const summary = summarizeWindow(readings);
      const prompt = parsed.data.question
        ? buildDirectPrompt(parsed.data.question, summary)
        : buildAnalysisPrompt({ readings, summary, listingLimit });

      logger.info(
        { deviceId, readings: readings.length, direct: Boolean(parsed.data.question) },
        '[Analysis Stream] Starting'
      );

      const fragments = services.reasoning.generateStream(prompt, STREAM_GENERATION_CONFIG);
      return new Response(toEventStream(fragments), { headers: SSE_HEADERS });
    } catch (error) {
      return handleApiError(c, error, 'Analysis Stream');
    }
  });

  return router;
}
