import type { TargetService, WorkItem, WorkTimeDraft, WorkTimeRecord } from '@timelog/sync-sdk';
import { idFromHref, type OpenProjectClient } from './client.js';
import type { OpTimeEntryRequest } from './types.js';

const API_PREFIX = '/api/v3';

function sameName(candidate: string | undefined, wanted: string): boolean {
  return candidate !== undefined && candidate.trim().toLowerCase() === wanted.trim().toLowerCase();
}

/**
 * ISO-8601 duration as OpenProject expects it for `hours`.
 */
export function toIsoDuration(seconds: number): string {
  return `PT${Math.max(0, Math.round(seconds))}S`;
}

export function buildTimeEntryRequest(draft: WorkTimeDraft): OpTimeEntryRequest {
  const request: OpTimeEntryRequest = {
    _links: {
      workPackage: { href: `${API_PREFIX}/work_packages/${draft.workItemId}` },
      project: { href: `${API_PREFIX}/projects/${draft.projectId}` },
      user: { href: `${API_PREFIX}/users/${draft.userId}` },
    },
    hours: toIsoDuration(draft.durationSeconds),
    spentOn: draft.spentOn,
    comment: { raw: draft.comment },
  };

  if (draft.activityId) {
    request._links.activity = { href: `${API_PREFIX}/time_entries/activities/${draft.activityId}` };
  }

  return request;
}

/**
 * OpenProject work packages and time entries behind the importer's TargetService port.
 * Name lookups use the API's fuzzy filters, then keep only exact (case-insensitive) matches.
 */
export function createOpenProjectTarget(client: OpenProjectClient): TargetService {
  return {
    async getWorkItem(id: string): Promise<WorkItem | null> {
      const workPackage = await client.getWorkPackage(id);
      if (!workPackage) return null;

      const projectId = idFromHref(workPackage._links.project.href);
      if (!projectId) {
        throw new Error(`Work package #${id} has no project link`);
      }

      return {
        id: String(workPackage.id),
        subject: workPackage.subject,
        projectId,
      };
    },

    async findUserByName(name: string): Promise<string | null> {
      const users = await client.findUsers(name);
      const match = users.find((user) => sameName(user.name, name) || sameName(user.login, name));
      return match ? String(match.id) : null;
    },

    async findProjectByName(name: string): Promise<string | null> {
      const projects = await client.findProjects(name);
      const match = projects.find((project) => sameName(project.name, name) || sameName(project.identifier, name));
      return match ? String(match.id) : null;
    },

    async listWorkTimeRecords(workItemId: string): Promise<WorkTimeRecord[]> {
      const entries = await client.listTimeEntries(workItemId);
      return entries.map((entry) => ({
        id: String(entry.id),
        workItemId,
        comment: entry.comment?.raw ?? '',
      }));
    },

    async createWorkTimeRecord(draft: WorkTimeDraft): Promise<string> {
      const created = await client.createTimeEntry(buildTimeEntryRequest(draft));
      return String(created.id);
    },
  };
}
