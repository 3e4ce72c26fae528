/**
 * Error Types
 *
 * ValidationError: a required contact field is missing or malformed.
 * UpstreamError: a field-service platform call failed after retries.
 */

import type { GatewayOperation } from '../types/lead.types';

export class ValidationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class UpstreamError extends Error {
  readonly operation: GatewayOperation;

  /** HTTP status from the platform; null when no response was received */
  readonly statusCode: number | null;

  /** Wait requested by the platform's Retry-After header */
  readonly retryAfterMs?: number;

  constructor(
    operation: GatewayOperation,
    statusCode: number | null,
    message: string,
    retryAfterMs?: number
  ) {
    super(message);
    this.name = 'UpstreamError';
    this.operation = operation;
    this.statusCode = statusCode;
    this.retryAfterMs = retryAfterMs;
  }

  /** Network failures, rate limiting and server errors may succeed later */
  get retryable(): boolean {
    return this.statusCode === null || this.statusCode === 429 || this.statusCode >= 500;
  }
}

export const isValidationError = (error: unknown): error is ValidationError =>
  error instanceof ValidationError;

export const isUpstreamError = (error: unknown): error is UpstreamError =>
  error instanceof UpstreamError;

/** Message of any thrown value */
export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
