import { dateRangeSchema, type DateRange } from '@timelog/sync-sdk';

export const DEFAULT_WINDOW_DAYS = 2;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DateRangeFlags {
  since?: string;
  until?: string;
  days?: number;
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function toDateString(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function shiftDays(date: string, days: number): string {
  const ms = Date.parse(`${date}T00:00:00Z`);
  if (!Number.isFinite(ms)) {
    // left as is; the schema reports the bad date
    return date;
  }

  return toDateString(new Date(ms + days * DAY_MS));
}

/**
 * Range to import, in UTC calendar days, both ends inclusive.
 *
 * - no flags: the last two days up to today
 * - `--days N`: N days back from `--until` (or today)
 * - `--since` without `--days`: up to `--until` (or today)
 */
export function resolveDateRange(flags: DateRangeFlags, now: Date = new Date()): DateRange {
  if (flags.since !== undefined && flags.days !== undefined) {
    throw new UsageError('--since and --days cannot be combined');
  }

  if (flags.days !== undefined && (!Number.isInteger(flags.days) || flags.days < 0)) {
    throw new UsageError(`--days must be a non-negative integer, got ${flags.days}`);
  }

  const endDate = flags.until ?? toDateString(now);
  const startDate = flags.since ?? shiftDays(endDate, -(flags.days ?? DEFAULT_WINDOW_DAYS));

  const result = dateRangeSchema.safeParse({ startDate, endDate });
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new UsageError(`Invalid date range ${startDate}..${endDate} (${detail})`);
  }

  return result.data;
}
