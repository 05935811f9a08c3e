/**
 * Error taxonomy shared by the crawler, the ledger and the HTTP layer.
 *
 * FetchError and ExtractionError are recovered by the crawl orchestrator and
 * only show up in crawl-run records and the variation's last crawl error.
 * ValidationError and NotFoundError are surfaced to the caller as-is.
 */

import { ZodError } from 'zod';

export type ErrorCode = 'FETCH_FAILED' | 'EXTRACTION_FAILED' | 'VALIDATION_FAILED' | 'NOT_FOUND';

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  abstract readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(message: string, options?: { cause?: unknown; details?: Record<string, unknown> }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = new.target.name;
    this.details = options?.details;
  }
}

/** Network failure, timeout or non-2xx response while fetching a page. */
export class FetchError extends AppError {
  readonly code = 'FETCH_FAILED';
  readonly statusCode = 502;
  readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.status = options?.status;
  }
}

/** An extractor crashed; finding no price is not an error and returns null instead. */
export class ExtractionError extends AppError {
  readonly code = 'EXTRACTION_FAILED';
  readonly statusCode = 500;
  readonly extractor: string;

  constructor(extractor: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.extractor = extractor;
  }
}

export class ValidationError extends AppError {
  readonly code = 'VALIDATION_FAILED';
  readonly statusCode = 400;
}

export class NotFoundError extends AppError {
  readonly code = 'NOT_FOUND';
  readonly statusCode = 404;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return typeof error === 'string' ? error : 'Unknown error';
}

/**
 * Convert a zod failure into a ValidationError listing each issue.
 */
export function fromZodError(error: ZodError, message = 'Invalid request'): ValidationError {
  return new ValidationError(message, {
    cause: error,
    details: {
      issues: error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    }
  });
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
