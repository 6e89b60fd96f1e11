import { describe, expect, it, vi } from 'vitest';

// Mock logger before import
vi.mock('./logger', () => ({
  logger: { error: vi.fn(), warn: vi.fn(), info: vi.fn() },
}));

// Mock Hono context
function createMockContext() {
  const jsonFn = vi.fn((body: unknown, status?: number) => {
    return { body, status: status ?? 200 } as unknown as Response;
  });
  return { json: jsonFn } as unknown as import('hono').Context;
}

import { ServiceUnavailableError, StorageFailureError } from './errors';
import {
  handleApiError,
  handleNotFoundError,
  handleValidationError,
  jsonSuccess,
  jsonSuccessData,
} from './error-handler';
import { logger } from './logger';

describe('handleApiError (classifyError integration)', () => {
  it('should return 503 for a missing reasoning service', () => {
    const c = createMockContext();
    handleApiError(c, new ServiceUnavailableError('Gemini', 'GEMINI_API_KEY not configured'));
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: false,
        error: 'GEMINI_API_KEY not configured',
        code: 'SERVICE_UNAVAILABLE',
      }),
      503
    );
  });

  it('should return 500 STORAGE_ERROR for storage failures', () => {
    const c = createMockContext();
    handleApiError(c, new StorageFailureError('insertReading', 'connection refused'));
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({
        code: 'STORAGE_ERROR',
        error: 'Storage failure during insertReading: connection refused',
      }),
      500
    );
  });

  it('should return 400 for malformed JSON bodies', () => {
    const c = createMockContext();
    handleApiError(c, new SyntaxError('Unexpected token'));
    expect(c.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'VALIDATION_ERROR' }), 400);
  });

  it('should return 429 for rate limit errors', () => {
    const c = createMockContext();
    handleApiError(c, new Error('Rate limit exceeded'));
    expect(c.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'RATE_LIMIT' }), 429);
  });

  it('should return 504 for timeout errors', () => {
    const c = createMockContext();
    handleApiError(c, new Error('Request timed out'));
    expect(c.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'TIMEOUT' }), 504);
  });

  it('should return 404 for not found errors', () => {
    const c = createMockContext();
    handleApiError(c, new Error('Device not found'));
    expect(c.json).toHaveBeenCalledWith(expect.objectContaining({ code: 'NOT_FOUND' }), 404);
  });

  it('should return 500 for unknown errors and log them as errors', () => {
    const c = createMockContext();
    handleApiError(c, 'plain string failure', 'Flow');
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'INTERNAL_ERROR', error: 'plain string failure' }),
      500
    );
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ code: 'INTERNAL_ERROR' }),
      '[Flow] plain string failure'
    );
  });
});

describe('response helpers', () => {
  it('handleValidationError returns 400', () => {
    const c = createMockContext();
    handleValidationError(c, 'value: Required');
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({ success: false, error: 'value: Required', code: 'VALIDATION_ERROR' }),
      400
    );
  });

  it('handleNotFoundError names the resource', () => {
    const c = createMockContext();
    handleNotFoundError(c, 'Route');
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({ error: 'Route not found', code: 'NOT_FOUND' }),
      404
    );
  });

  it('jsonSuccess spreads the payload', () => {
    const c = createMockContext();
    jsonSuccess(c, { status: 'queued' });
    expect(c.json).toHaveBeenCalledWith(
      expect.objectContaining({ success: true, status: 'queued', timestamp: expect.any(String) }),
      200
    );
  });

  it('jsonSuccessData wraps the payload', () => {
    const c = createMockContext();
    jsonSuccessData(c, [1, 2]);
    expect(c.json).toHaveBeenCalledWith(expect.objectContaining({ success: true, data: [1, 2] }), 200);
  });
});
