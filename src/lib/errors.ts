/**
 * Error taxonomy for the flow monitor.
 *
 * Malformed reasoning output has no class here: the response interpreter
 * absorbs it into a fallback assessment.
 */

/** No reasoning credential configured. Raised before any network attempt. */
export class ServiceUnavailableError extends Error {
  public readonly service: string;

  constructor(service: string, message = `${service} is not configured`) {
    super(message);
    this.name = 'ServiceUnavailableError';
    this.service = service;
  }
}

/** A storage operation failed; propagated to the caller, never retried. */
export class StorageFailureError extends Error {
  public readonly operation: string;

  constructor(operation: string, message: string, options?: { cause?: unknown }) {
    super(`Storage failure during ${operation}: ${message}`, options);
    this.name = 'StorageFailureError';
    this.operation = operation;
  }
}

/** Fewer readings stored than the analysis minimum. */
export class InsufficientDataError extends Error {
  public readonly available: number;
  public readonly required: number;

  constructor(available: number, required: number) {
    super(`Not enough readings to analyze: ${available} available, ${required} required`);
    this.name = 'InsufficientDataError';
    this.available = available;
    this.required = required;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
