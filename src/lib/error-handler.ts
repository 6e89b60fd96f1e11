/**
 * API Error Handling
 *
 * Uniform JSON error/success envelopes for the Hono routes.
 * Typed errors map directly to a status; anything else is classified by message.
 */

import type { Context } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import {
  ServiceUnavailableError,
  StorageFailureError,
  getErrorMessage,
} from './errors';
import { logger } from './logger';

export type ApiErrorCode =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'SERVICE_UNAVAILABLE'
  | 'STORAGE_ERROR'
  | 'TIMEOUT'
  | 'RATE_LIMIT'
  | 'INTERNAL_ERROR';

interface ClassifiedError {
  code: ApiErrorCode;
  status: ContentfulStatusCode;
}

function classifyError(error: unknown): ClassifiedError {
  if (error instanceof ServiceUnavailableError) {
    return { code: 'SERVICE_UNAVAILABLE', status: 503 };
  }
  if (error instanceof StorageFailureError) {
    return { code: 'STORAGE_ERROR', status: 500 };
  }
  if (error instanceof SyntaxError) {
    // c.req.json() on a malformed body
    return { code: 'VALIDATION_ERROR', status: 400 };
  }

  const message = getErrorMessage(error).toLowerCase();
  if (message.includes('rate limit') || message.includes('too many') || message.includes('quota')) {
    return { code: 'RATE_LIMIT', status: 429 };
  }
  if (message.includes('timeout') || message.includes('timed out')) {
    return { code: 'TIMEOUT', status: 504 };
  }
  if (message.includes('not found')) {
    return { code: 'NOT_FOUND', status: 404 };
  }
  return { code: 'INTERNAL_ERROR', status: 500 };
}

export function handleApiError(c: Context, error: unknown, context = 'API') {
  const { code, status } = classifyError(error);
  const message = getErrorMessage(error);

  if (status >= 500) {
    logger.error({ err: error, code }, `[${context}] ${message}`);
  } else {
    logger.warn({ code }, `[${context}] ${message}`);
  }

  return c.json(
    {
      success: false,
      error: message,
      code,
      timestamp: new Date().toISOString(),
    },
    status
  );
}

export function handleValidationError(c: Context, message: string) {
  return c.json(
    {
      success: false,
      error: message,
      code: 'VALIDATION_ERROR' satisfies ApiErrorCode,
      timestamp: new Date().toISOString(),
    },
    400
  );
}

export function handleNotFoundError(c: Context, resource: string) {
  return c.json(
    {
      success: false,
      error: `${resource} not found`,
      code: 'NOT_FOUND' satisfies ApiErrorCode,
      timestamp: new Date().toISOString(),
    },
    404
  );
}

/** A `timestamp` in the payload takes precedence over the response time */
export function jsonSuccess<T extends Record<string, unknown>>(c: Context, data: T) {
  return c.json(
    {
      success: true,
      timestamp: new Date().toISOString(),
      ...data,
    },
    200
  );
}

export function jsonSuccessData<T>(c: Context, data: T) {
  return c.json(
    {
      success: true,
      data,
      timestamp: new Date().toISOString(),
    },
    200
  );
}
