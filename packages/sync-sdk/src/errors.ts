export class ApiHttpError extends Error {
  readonly service: string;
  readonly status: number;
  readonly body: string;
  readonly retryAfterMs?: number;

  constructor(service: string, status: number, body: string, retryAfterMs?: number) {
    super(`${service} API request failed with status ${status}`);
    this.name = 'ApiHttpError';
    this.service = service;
    this.status = status;
    this.body = body;
    this.retryAfterMs = retryAfterMs;
  }
}

/**
 * A retryable failure that used up its retry budget.
 */
export class TransientApiError extends Error {
  readonly attempts: number;
  readonly retryAfterMs?: number;

  constructor(message: string, attempts: number, cause: unknown) {
    super(message, { cause });
    this.name = 'TransientApiError';
    this.attempts = attempts;
    this.retryAfterMs = cause instanceof ApiHttpError ? cause.retryAfterMs : undefined;
  }
}

/**
 * Source-level failure. Aborts the whole run.
 */
export class FatalSourceError extends Error {
  readonly sourceId: string;

  constructor(sourceId: string, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'FatalSourceError';
    this.sourceId = sourceId;
  }
}

export class SourceAuthError extends FatalSourceError {
  constructor(sourceId: string, message: string, cause?: unknown) {
    super(sourceId, message, cause);
    this.name = 'SourceAuthError';
  }
}

export class SourceUnavailableError extends FatalSourceError {
  constructor(sourceId: string, message: string, cause?: unknown) {
    super(sourceId, message, cause);
    this.name = 'SourceUnavailableError';
  }
}

export function isAuthFailure(error: unknown): boolean {
  return error instanceof ApiHttpError && (error.status === 401 || error.status === 403);
}

/**
 * Rate limits, server errors and network/timeout failures are worth another attempt.
 */
export function isTransientFailure(error: unknown): boolean {
  if (error instanceof ApiHttpError) {
    return error.status === 429 || error.status >= 500;
  }

  if (error instanceof TransientApiError || error instanceof FatalSourceError) {
    return false;
  }

  return error instanceof Error;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
