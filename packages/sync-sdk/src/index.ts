export type {
  SourceEntry,
  DateRange,
  TimeSource,
  TimeSourceManifest,
  WorkItem,
  WorkTimeRecord,
  WorkTimeDraft,
  TargetService,
} from './types.js';
export { sourceEntrySchema, dateRangeSchema, validateSourceEntry } from './schema.js';
export type { ValidatedSourceEntry, ValidateSourceEntryOptions } from './schema.js';
export {
  ApiHttpError,
  TransientApiError,
  FatalSourceError,
  SourceAuthError,
  SourceUnavailableError,
  isAuthFailure,
  isTransientFailure,
  errorMessage,
} from './errors.js';
export { withRetry, computeBackoffMs, sleep } from './retry.js';
export type { RetryPolicy, RetryOptions } from './retry.js';
export { parseRetryAfter, basicAuthHeader } from './http.js';
