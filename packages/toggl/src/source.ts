import {
  ApiHttpError,
  SourceAuthError,
  SourceUnavailableError,
  errorMessage,
  isAuthFailure,
  validateSourceEntry,
  type DateRange,
  type SourceEntry,
  type TimeSource,
  type ValidateSourceEntryOptions,
} from '@timelog/sync-sdk';
import type { TogglClient } from './client.js';
import { mapReportRow } from './mapper.js';
import type { TogglPageCursor } from './types.js';

export const TOGGL_SOURCE_ID = 'toggl';

export interface TogglSourceOptions {
  workspaceId?: number;
  pageSize?: number;
  onInvalid?: ValidateSourceEntryOptions['onInvalid'];
  onProjectUnavailable?: (projectId: number, error: ApiHttpError) => void;
}

/** Stand-in name for a project the token cannot read; no target project carries it unless aliased. */
export function unavailableProjectName(projectId: number): string {
  return `toggl-project:${projectId}`;
}

function isUnreadableProject(error: unknown): error is ApiHttpError {
  return error instanceof ApiHttpError && (error.status === 403 || error.status === 404);
}

async function lookupProjectName(
  client: TogglClient,
  workspaceId: number,
  projectId: number,
  options: TogglSourceOptions,
): Promise<string> {
  try {
    return (await client.getProject(workspaceId, projectId)).name;
  } catch (error) {
    if (!isUnreadableProject(error)) {
      throw error;
    }
    options.onProjectUnavailable?.(projectId, error);
    return unavailableProjectName(projectId);
  }
}

function toSourceError(error: unknown): SourceAuthError | SourceUnavailableError {
  if (error instanceof SourceAuthError || error instanceof SourceUnavailableError) {
    return error;
  }

  if (isAuthFailure(error)) {
    return new SourceAuthError(TOGGL_SOURCE_ID, 'Toggl rejected the API token', error);
  }

  return new SourceUnavailableError(TOGGL_SOURCE_ID, `Toggl is unavailable: ${errorMessage(error)}`, error);
}

async function* traverse(client: TogglClient, range: DateRange, options: TogglSourceOptions): AsyncGenerator<SourceEntry> {
  const workspaceId = options.workspaceId ?? (await client.getMe()).default_workspace_id;
  const projectNames = new Map<number, string>();
  let cursor: TogglPageCursor | undefined;

  while (true) {
    const page = await client.searchTimeEntries(workspaceId, {
      startDate: range.startDate,
      endDate: range.endDate,
      pageSize: options.pageSize,
      cursor,
    });

    for (const row of page.rows) {
      let projectName: string | null = null;
      if (row.project_id !== null) {
        projectName = projectNames.get(row.project_id) ?? null;
        if (projectName === null) {
          projectName = await lookupProjectName(client, workspaceId, row.project_id, options);
          projectNames.set(row.project_id, projectName);
        }
      }

      for (const candidate of mapReportRow(row, workspaceId, projectName)) {
        const entry = validateSourceEntry(candidate, { onInvalid: options.onInvalid });
        if (entry) {
          yield entry;
        }
      }
    }

    if (!page.next) {
      return;
    }

    cursor = page.next;
  }
}

/**
 * Toggl Track as a paginated time source (Reports API v3 detailed search).
 * Pages are pulled on demand; only the current page is held in memory.
 */
export function createTogglSource(client: TogglClient, options: TogglSourceOptions = {}): TimeSource {
  return {
    manifest: { id: TOGGL_SOURCE_ID, name: 'Toggl Track' },
    entries(range: DateRange): AsyncIterable<SourceEntry> {
      return {
        async *[Symbol.asyncIterator]() {
          try {
            yield* traverse(client, range, options);
          } catch (error) {
            throw toSourceError(error);
          }
        },
      };
    },
  };
}
