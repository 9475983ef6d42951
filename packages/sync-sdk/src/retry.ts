import { ApiHttpError, TransientApiError, isTransientFailure } from './errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
}

export interface RetryOptions extends RetryPolicy {
  label: string;
  isRetryable?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, waitMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_BASE_DELAY_MS = 500;
const DEFAULT_MAX_DELAY_MS = 30_000;
const DEFAULT_JITTER_MS = 250;

/**
 * Delay before retry number `attempt` (0-based). A server-provided
 * Retry-After wins over the exponential schedule.
 */
export function computeBackoffMs(error: unknown, attempt: number, policy: RetryPolicy): number {
  if (error instanceof ApiHttpError && error.retryAfterMs !== undefined) {
    return error.retryAfterMs;
  }

  const base = policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;
  const maxDelay = policy.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  const maxJitter = policy.jitterMs ?? DEFAULT_JITTER_MS;
  const jitter = maxJitter > 0 ? Math.floor(Math.random() * maxJitter) : 0;

  return Math.min(maxDelay, base * 2 ** attempt + jitter);
}

/**
 * Run `task`, retrying transient failures with exponential backoff.
 * Non-retryable errors are rethrown unchanged; a retryable error that
 * outlives the budget is wrapped in TransientApiError.
 */
export async function withRetry<T>(task: (attempt: number) => Promise<T>, options: RetryOptions): Promise<T> {
  const isRetryable = options.isRetryable ?? isTransientFailure;
  const wait = options.sleep ?? sleep;

  let attempt = 0;
  while (true) {
    try {
      return await task(attempt);
    } catch (error) {
      if (!isRetryable(error)) {
        throw error;
      }

      if (attempt >= options.maxRetries) {
        const detail = error instanceof Error ? error.message : String(error);
        throw new TransientApiError(`${options.label} failed after ${attempt + 1} attempts: ${detail}`, attempt + 1, error);
      }

      const waitMs = computeBackoffMs(error, attempt, options);
      options.onRetry?.(error, attempt, waitMs);
      await wait(waitMs);
      attempt += 1;
    }
  }
}
