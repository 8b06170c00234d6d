import { HttpException, HttpStatus } from '@nestjs/common';
import { UpstreamServiceError } from './deck-generation.errors';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wrap a failure in the `{ error, detail, timestamp }` body the API returns.
 * HttpExceptions are passed through untouched.
 */
export function toHttpException(error: unknown, label: string): HttpException {
  if (error instanceof HttpException) {
    return error;
  }

  // Configuration problems are server faults; the LLM being down is a 503.
  const status = error instanceof UpstreamServiceError
    ? HttpStatus.SERVICE_UNAVAILABLE
    : HttpStatus.INTERNAL_SERVER_ERROR;

  return new HttpException(
    {
      error: label,
      detail: errorMessage(error),
      timestamp: new Date().toISOString(),
    },
    status,
  );
}
