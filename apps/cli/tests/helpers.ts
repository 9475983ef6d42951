import type { SourceEntry, TargetService, TimeSource, WorkTimeDraft } from '@timelog/sync-sdk';
import pino, { type Logger } from 'pino';

export const testEnv = {
  TOGGL_API_TOKEN: 'test-token',
  OPENPROJECT_API_KEY: 'test-key',
  OPENPROJECT_HOST: 'op.example.test',
  IMPORT_MAX_RETRIES: '0',
};

export function silentPino(): Logger {
  return pino({ level: 'silent' });
}

export function entry(sourceId: string, description: string): SourceEntry {
  return {
    sourceId,
    description,
    start: '2024-03-04T09:00:00+01:00',
    stop: '2024-03-04T10:00:00+01:00',
    durationSeconds: 3600,
    userName: 'Jane Doe',
    projectName: null,
    workspaceId: '77',
  };
}

export function listSource(entries: SourceEntry[], failure?: Error): TimeSource {
  return {
    manifest: { id: 'toggl', name: 'Toggl Track' },
    entries: () => ({
      async *[Symbol.asyncIterator]() {
        yield* entries;
        if (failure) {
          throw failure;
        }
      },
    }),
  };
}

/**
 * One work package (#482 in project 5) and one user (Jane Doe).
 */
export function singleItemTarget(drafts: WorkTimeDraft[] = []): TargetService {
  return {
    getWorkItem: async (id) => (id === '482' ? { id, subject: 'Login bug', projectId: '5' } : null),
    findUserByName: async (name) => (name === 'Jane Doe' ? '8' : null),
    findProjectByName: async () => null,
    listWorkTimeRecords: async (workItemId) =>
      drafts.filter((draft) => draft.workItemId === workItemId).map((draft, i) => ({ id: String(i + 1), workItemId, comment: draft.comment })),
    createWorkTimeRecord: async (draft) => {
      drafts.push(draft);
      return String(drafts.length);
    },
  };
}
