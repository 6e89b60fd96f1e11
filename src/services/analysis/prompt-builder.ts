/**
 * Analysis Prompt Builder
 *
 * Pure formatting of a reading window into the trend-analysis request.
 * The numeric summary and the raw listing are bounded separately.
 */

import type { Reading, WindowSummary } from '../../types/telemetry';
import { RESPONSE_SHAPE_EXAMPLE } from './trend-contract';

export const DEFAULT_LISTING_LIMIT = 10;

export interface AnalysisPromptInput {
  /** Newest first */
  readings: readonly Reading[];
  summary: WindowSummary;
  listingLimit?: number;
}

export function formatReadingLine(reading: Reading): string {
  return `ID: ${reading.id}, Flow: ${reading.value}%, Timestamp: ${reading.timestamp}`;
}

export function formatSummaryBlock(summary: WindowSummary): string {
  return [
    `- Average: ${summary.mean.toFixed(2)}%`,
    `- Maximum: ${summary.max.toFixed(2)}%`,
    `- Minimum: ${summary.min.toFixed(2)}%`,
    `- Total records: ${summary.count}`,
  ].join('\n');
}

export function buildAnalysisPrompt({
  readings,
  summary,
  listingLimit = DEFAULT_LISTING_LIMIT,
}: AnalysisPromptInput): string {
  const listed = readings.slice(0, Math.max(0, listingLimit));
  const listing = listed.length > 0 ? listed.map(formatReadingLine).join('\n') : '(no readings)';

  return `# Water Flow Data Analysis

Analyze the following water flow telemetry and provide a detailed assessment.

## Summary statistics
${formatSummaryBlock(summary)}

## Most recent ${listed.length} readings (newest first)
\`\`\`
${listing}
\`\`\`

## Instructions
1. Identify patterns in the flow data (stable, increasing, decreasing, fluctuating)
2. Detect anomalies that could indicate leaks or faults
3. Estimate the probability of a leak from the patterns
4. Recommend specific actions

## Response format
Respond ONLY with a JSON object with exactly this structure:

${JSON.stringify(RESPONSE_SHAPE_EXAMPLE, null, 2)}
`;
}

/**
 * Prompt for free-form streamed answers about the same window.
 */
export function buildDirectPrompt(question: string, summary: WindowSummary): string {
  return `You are assisting the operator of a water flow monitoring system.

Current window statistics:
${formatSummaryBlock(summary)}

Answer the following question in markdown, step by step:

${question}
`;
}
