import type { SourceEntry } from '@timelog/sync-sdk';
import type { TogglReportRow, TogglReportTimeEntry } from './types.js';

/**
 * Flatten a report row into one SourceEntry per time entry.
 * Rows carry the shared attributes; the nested entries carry timing.
 */
export function mapReportRow(row: TogglReportRow, workspaceId: number, projectName: string | null): SourceEntry[] {
  return row.time_entries.map((entry) => mapTimeEntry(row, entry, workspaceId, projectName));
}

export function mapTimeEntry(
  row: TogglReportRow,
  entry: TogglReportTimeEntry,
  workspaceId: number,
  projectName: string | null,
): SourceEntry {
  return {
    sourceId: String(entry.id),
    description: row.description?.trim() ?? '',
    start: entry.start,
    stop: entry.stop ?? null,
    durationSeconds: entry.stop ? entry.seconds : -1,
    userName: row.username,
    projectName,
    workspaceId: String(workspaceId),
  };
}
