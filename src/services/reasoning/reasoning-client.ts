/**
 * Reasoning Client
 *
 * Gemini text generation through the AI SDK.
 * - generate(): one blocking call, full text. Missing key -> ServiceUnavailableError
 *   before any network attempt.
 * - generateStream(): text deltas as they arrive. Failures become one final
 *   human-readable fragment; the generator always ends normally.
 */

import { createGoogleGenerativeAI } from '@ai-sdk/google';
import { generateText, streamText } from 'ai';
import { ServiceUnavailableError, getErrorMessage } from '../../lib/errors';
import { logger } from '../../lib/logger';
import type { GenerationConfig } from '../../types/telemetry';

export const DEFAULT_GEMINI_MODEL = 'gemini-2.0-flash';

export const ANALYSIS_GENERATION_CONFIG: GenerationConfig = {
  temperature: 0.7,
  topP: 0.95,
  topK: 40,
  maxOutputTokens: 4096,
};

export const STREAM_GENERATION_CONFIG: GenerationConfig = {
  ...ANALYSIS_GENERATION_CONFIG,
  maxOutputTokens: 2048,
};

export interface ReasoningClient {
  isAvailable(): boolean;
  generate(prompt: string, config?: GenerationConfig): Promise<string>;
  generateStream(prompt: string, config?: GenerationConfig): AsyncGenerator<string, void, void>;
}

export function streamErrorFragment(error: unknown): string {
  return `Streaming error: ${getErrorMessage(error)}`;
}

export interface GeminiReasoningClientOptions {
  apiKey: string | null;
  modelId?: string;
}

export class GeminiReasoningClient implements ReasoningClient {
  private provider: ReturnType<typeof createGoogleGenerativeAI> | null = null;
  private readonly apiKey: string | null;
  private readonly modelId: string;

  constructor(options: GeminiReasoningClientOptions) {
    this.apiKey = options.apiKey;
    this.modelId = options.modelId ?? DEFAULT_GEMINI_MODEL;
  }

  isAvailable(): boolean {
    return this.apiKey !== null;
  }

  /**
   * Lazily created provider; throws when no key is configured
   */
  private getProvider(): ReturnType<typeof createGoogleGenerativeAI> {
    if (this.provider) return this.provider;
    if (!this.apiKey) {
      throw new ServiceUnavailableError('Gemini', 'GEMINI_API_KEY not configured');
    }
    this.provider = createGoogleGenerativeAI({ apiKey: this.apiKey });
    return this.provider;
  }

  async generate(
    prompt: string,
    config: GenerationConfig = ANALYSIS_GENERATION_CONFIG
  ): Promise<string> {
    const google = this.getProvider();
    const startTime = Date.now();

    const { text, usage } = await generateText({
      model: google(this.modelId),
      prompt,
      temperature: config.temperature,
      topP: config.topP,
      topK: config.topK,
      maxOutputTokens: config.maxOutputTokens,
    });

    logger.info(
      {
        model: this.modelId,
        inputTokens: usage?.inputTokens ?? 0,
        outputTokens: usage?.outputTokens ?? 0,
        durationMs: Date.now() - startTime,
      },
      '[Reasoning] Generation completed'
    );

    return text;
  }

  async *generateStream(
    prompt: string,
    config: GenerationConfig = STREAM_GENERATION_CONFIG
  ): AsyncGenerator<string, void, void> {
    try {
      const google = this.getProvider();
      const result = streamText({
        model: google(this.modelId),
        prompt,
        temperature: config.temperature,
        topP: config.topP,
        topK: config.topK,
        maxOutputTokens: config.maxOutputTokens,
        onError: ({ error }) => {
          logger.warn({ err: error }, '[Reasoning] Stream reported an error');
        },
      });

      for await (const part of result.fullStream) {
        if (part.type === 'text-delta') {
          if (part.text) yield part.text;
        } else if (part.type === 'error') {
          yield streamErrorFragment(part.error);
          return;
        }
      }
    } catch (error) {
      logger.error('[Reasoning] Stream failed', error);
      yield streamErrorFragment(error);
    }
  }
}
