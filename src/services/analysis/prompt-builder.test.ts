import { describe, expect, it } from 'vitest';
import type { Reading } from '../../types/telemetry';
import { summarizeWindow } from '../telemetry/flow-statistics';
import {
  buildAnalysisPrompt,
  buildDirectPrompt,
  formatReadingLine,
  formatSummaryBlock,
} from './prompt-builder';

function reading(id: number, value: number): Reading {
  return {
    id,
    deviceId: 'default',
    value,
    timestamp: `2026-01-01T00:${String(id).padStart(2, '0')}:00.000Z`,
    attachedAnalysis: null,
  };
}

describe('formatReadingLine', () => {
  it('renders id, percentage and timestamp', () => {
    expect(formatReadingLine(reading(7, 42.5))).toBe(
      'ID: 7, Flow: 42.5%, Timestamp: 2026-01-01T00:07:00.000Z'
    );
  });
});

describe('formatSummaryBlock', () => {
  it('renders two decimals and the count', () => {
    expect(formatSummaryBlock({ mean: 20, max: 30.456, min: 10, count: 3 })).toBe(
      [
        '- Average: 20.00%',
        '- Maximum: 30.46%',
        '- Minimum: 10.00%',
        '- Total records: 3',
      ].join('\n')
    );
  });
});

describe('buildAnalysisPrompt', () => {
  const window = Array.from({ length: 15 }, (_, i) => reading(15 - i, 10 + i));

  it('lists at most the listing limit, newest first', () => {
    const prompt = buildAnalysisPrompt({
      readings: window,
      summary: summarizeWindow(window),
      listingLimit: 10,
    });

    expect(prompt).toContain('## Most recent 10 readings (newest first)');
    expect(prompt).toContain('ID: 15, Flow: 10%');
    expect(prompt).toContain('ID: 6, Flow: 19%');
    expect(prompt).not.toContain('ID: 5, Flow: 20%');
  });

  it('summarizes the whole window, not just the listing', () => {
    const prompt = buildAnalysisPrompt({ readings: window, summary: summarizeWindow(window) });

    expect(prompt).toContain('- Total records: 15');
    expect(prompt).toContain('- Average: 17.00%');
    expect(prompt).toContain('- Maximum: 24.00%');
  });

  it('embeds the response contract keys', () => {
    const prompt = buildAnalysisPrompt({ readings: window, summary: summarizeWindow(window) });

    expect(prompt).toContain('"leak_probability": "<number between 0 and 100>"');
    expect(prompt).toContain('"trend": "stable|increasing|decreasing|fluctuating"');
    expect(prompt).toContain('"identified_patterns"');
  });

  it('marks an empty listing', () => {
    const prompt = buildAnalysisPrompt({ readings: [], summary: summarizeWindow([]) });

    expect(prompt).toContain('## Most recent 0 readings (newest first)');
    expect(prompt).toContain('(no readings)');
    expect(prompt).toContain('- Total records: 0');
  });
});

describe('buildDirectPrompt', () => {
  it('includes the question after the summary', () => {
    const prompt = buildDirectPrompt('Is there a leak?', { mean: 50, max: 60, min: 40, count: 2 });

    expect(prompt).toContain('- Average: 50.00%');
    expect(prompt.trimEnd().endsWith('Is there a leak?')).toBe(true);
  });
});
