import type { SourceEntry } from '@timelog/sync-sdk';
import type { DurationSource } from './types.js';

/**
 * Seconds to log for an entry, or null while it is still running.
 *
 * - `reported`: the source's own duration
 * - `timestamps`: stop − start
 */
export function resolveDurationSeconds(entry: SourceEntry, source: DurationSource): number | null {
  if (entry.stop === null) {
    return null;
  }

  if (source === 'reported') {
    return entry.durationSeconds < 0 ? null : entry.durationSeconds;
  }

  const elapsedMs = Date.parse(entry.stop) - Date.parse(entry.start);
  if (!Number.isFinite(elapsedMs)) {
    return null;
  }

  return Math.max(0, Math.round(elapsedMs / 1000));
}

/**
 * Calendar date of the entry start, in the offset the source recorded.
 */
export function spentOnDate(entry: SourceEntry): string {
  return entry.start.slice(0, 10);
}
