/**
 * Trend Response Interpreter
 *
 * Turns untrusted model text into a TrendAssessment. Never throws:
 * every input maps to either a parsed assessment or a fallback one.
 *
 * Extraction: first `{` to last `}` of the trimmed text, then JSON.parse,
 * then per-field coercion with fixed defaults.
 */

import { z } from 'zod';
import { logger } from '../../lib/logger';
import { TREND_LABELS, type TrendAssessment, type TrendDetails, type TrendLabel } from '../../types/telemetry';
import { RAW_RESPONSE_KEY, RESPONSE_KEYS } from './trend-contract';

export const RAW_RESPONSE_PREVIEW_LENGTH = 500;
export const TRUNCATION_MARKER = '...';
export const DEFAULT_RECOMMENDATION = 'No recommendation available';
export const FALLBACK_RECOMMENDATION =
  'Automatic analysis incomplete; manual review of the readings is recommended';

export type TrendInterpretation =
  | { kind: 'parsed'; assessment: TrendAssessment }
  | { kind: 'fallback'; assessment: TrendAssessment; rawText: string };

// ============================================================================
// Field coercion
// ============================================================================

const TREND_LABEL_SET: ReadonlySet<string> = new Set(TREND_LABELS);

function isTrendLabel(value: string): value is TrendLabel {
  return TREND_LABEL_SET.has(value);
}

export function coerceTrend(value: unknown): TrendLabel {
  if (typeof value !== 'string') return 'unknown';
  const normalized = value.trim().toLowerCase();
  return isTrendLabel(normalized) ? normalized : 'unknown';
}

/** Numbers and numeric strings, clamped to [0, 100]; anything else is 0 */
export function coerceProbability(value: unknown): number {
  let numeric: number;
  if (typeof value === 'number') {
    numeric = value;
  } else if (typeof value === 'string' && value.trim() !== '') {
    numeric = Number(value.trim().replace(/%$/, ''));
  } else {
    return 0;
  }

  if (!Number.isFinite(numeric)) return 0;
  return Math.min(100, Math.max(0, numeric));
}

export function coerceRecommendation(value: unknown): string {
  return typeof value === 'string' && value.trim() !== '' ? value : DEFAULT_RECOMMENDATION;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function coerceDetails(value: unknown): TrendDetails {
  return isPlainObject(value) ? { ...value } : {};
}

const TrendResponseSchema = z
  .object({
    [RESPONSE_KEYS.trend]: z.unknown(),
    [RESPONSE_KEYS.leakProbability]: z.unknown(),
    [RESPONSE_KEYS.recommendation]: z.unknown(),
    [RESPONSE_KEYS.details]: z.unknown(),
  })
  .passthrough()
  .transform(
    (raw): TrendAssessment => ({
      trend: coerceTrend(raw[RESPONSE_KEYS.trend]),
      leakProbability: coerceProbability(raw[RESPONSE_KEYS.leakProbability]),
      recommendation: coerceRecommendation(raw[RESPONSE_KEYS.recommendation]),
      details: coerceDetails(raw[RESPONSE_KEYS.details]),
    })
  );

// ============================================================================
// Extraction
// ============================================================================

/**
 * Substring from the first `{` to the last `}`, or null when there is no such pair.
 */
export function extractJsonCandidate(text: string): string | null {
  const trimmed = text.trim();
  const start = trimmed.indexOf('{');
  const end = trimmed.lastIndexOf('}');
  if (start < 0 || end <= start) return null;
  return trimmed.slice(start, end + 1);
}

/** First characters by code point, so a surrogate pair is never split */
function previewOf(rawText: string): string {
  return Array.from(rawText).slice(0, RAW_RESPONSE_PREVIEW_LENGTH).join('');
}

export function createFallbackAssessment(rawText: string): TrendAssessment {
  return {
    trend: 'unknown',
    leakProbability: 0,
    recommendation: FALLBACK_RECOMMENDATION,
    details: {
      [RAW_RESPONSE_KEY]: previewOf(rawText) + TRUNCATION_MARKER,
    },
  };
}

export function decodeTrendResponse(rawText: string): TrendInterpretation {
  const fallback = (reason: string): TrendInterpretation => {
    logger.warn({ reason, length: rawText.length }, '[Interpreter] Unusable model response');
    return { kind: 'fallback', assessment: createFallbackAssessment(rawText), rawText };
  };

  const candidate = extractJsonCandidate(rawText);
  if (candidate === null) {
    return fallback('no JSON object found');
  }

  let parsedJson: unknown;
  try {
    parsedJson = JSON.parse(candidate);
  } catch (error) {
    return fallback(error instanceof Error ? error.message : 'JSON parse failed');
  }

  const parsed = TrendResponseSchema.safeParse(parsedJson);
  if (!parsed.success) {
    return fallback('JSON is not an object');
  }

  return { kind: 'parsed', assessment: parsed.data };
}

export function interpretTrendResponse(rawText: string): TrendAssessment {
  return decodeTrendResponse(rawText).assessment;
}
