import { describe, expect, it, vi } from 'vitest';

vi.mock('../../lib/logger', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() },
}));

import {
  DEFAULT_RECOMMENDATION,
  FALLBACK_RECOMMENDATION,
  coerceDetails,
  coerceProbability,
  coerceTrend,
  createFallbackAssessment,
  decodeTrendResponse,
  extractJsonCandidate,
  interpretTrendResponse,
} from './response-interpreter';

describe('decodeTrendResponse', () => {
  it('parses a clean JSON object', () => {
    const result = decodeTrendResponse(
      '{"trend":"increasing","leak_probability":35,"recommendation":"Check valve 3","details":{"anomalies":["spike"]}}'
    );

    expect(result).toEqual({
      kind: 'parsed',
      assessment: {
        trend: 'increasing',
        leakProbability: 35,
        recommendation: 'Check valve 3',
        details: { anomalies: ['spike'] },
      },
    });
  });

  it('extracts JSON wrapped in prose and code fences', () => {
    const text = 'Here is the analysis:\n```json\n{"trend":"stable","leak_probability":5,"recommendation":"None"}\n```\nThanks';
    const result = decodeTrendResponse(text);

    expect(result.kind).toBe('parsed');
    expect(result.assessment.trend).toBe('stable');
    expect(result.assessment.leakProbability).toBe(5);
    expect(result.assessment.details).toEqual({});
  });

  it('falls back on text without an object', () => {
    const text = 'The flow looks stable overall.';
    const result = decodeTrendResponse(text);

    expect(result).toEqual({
      kind: 'fallback',
      rawText: text,
      assessment: {
        trend: 'unknown',
        leakProbability: 0,
        recommendation: FALLBACK_RECOMMENDATION,
        details: { raw_response: 'The flow looks stable overall....' },
      },
    });
  });

  it('falls back on malformed JSON and keeps a 500 character preview', () => {
    const text = `{"trend": "stable", ${'x'.repeat(600)} }`;
    const result = decodeTrendResponse(text);

    expect(result.kind).toBe('fallback');
    const preview = result.assessment.details.raw_response;
    expect(preview).toBe(text.slice(0, 500) + '...');
    expect(typeof preview === 'string' && preview.length).toBe(503);
  });

  it('cuts the preview on code points without splitting a surrogate pair', () => {
    const text = 'a'.repeat(499) + '\u{1F4A7}' + 'tail';
    const preview = createFallbackAssessment(text).details.raw_response;

    expect(preview).toBe('a'.repeat(499) + '\u{1F4A7}...');
  });

  it('falls back when the braces are reversed', () => {
    expect(decodeTrendResponse('} nothing {').kind).toBe('fallback');
  });

  it('applies defaults to missing fields', () => {
    expect(interpretTrendResponse('{}')).toEqual({
      trend: 'unknown',
      leakProbability: 0,
      recommendation: DEFAULT_RECOMMENDATION,
      details: {},
    });
  });

  it('coerces each field independently', () => {
    expect(
      interpretTrendResponse(
        '{"trend":"Fluctuating","leak_probability":"140%","recommendation":"","details":[1,2]}'
      )
    ).toEqual({
      trend: 'fluctuating',
      leakProbability: 100,
      recommendation: DEFAULT_RECOMMENDATION,
      details: {},
    });
  });
});

describe('extractJsonCandidate', () => {
  it('spans first opening to last closing brace', () => {
    expect(extractJsonCandidate('  a {"x":{"y":1}} b ')).toBe('{"x":{"y":1}}');
  });

  it('returns null without braces', () => {
    expect(extractJsonCandidate('plain text')).toBeNull();
  });
});

describe('coercers', () => {
  it.each([
    ['stable', 'stable'],
    [' INCREASING ', 'increasing'],
    ['sideways', 'unknown'],
    [42, 'unknown'],
    [null, 'unknown'],
  ])('coerceTrend(%j) -> %s', (input, expected) => {
    expect(coerceTrend(input)).toBe(expected);
  });

  it.each([
    [35, 35],
    ['42.5', 42.5],
    ['12%', 12],
    [-3, 0],
    [250, 100],
    ['high', 0],
    ['', 0],
    [Number.NaN, 0],
    [true, 0],
  ])('coerceProbability(%j) -> %s', (input, expected) => {
    expect(coerceProbability(input)).toBe(expected);
  });

  it('copies plain-object details only', () => {
    const details = { explanation: 'ok' };
    const coerced = coerceDetails(details);

    expect(coerced).toEqual(details);
    expect(coerced).not.toBe(details);
    expect(coerceDetails('text')).toEqual({});
    expect(coerceDetails(null)).toEqual({});
  });
});
