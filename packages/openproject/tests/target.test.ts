import { describe, expect, it, vi } from 'vitest';
import type { OpenProjectClient } from '../src/client.js';
import { buildTimeEntryRequest, createOpenProjectTarget } from '../src/target.js';

function clientMock(overrides: Partial<Record<keyof OpenProjectClient, unknown>>): OpenProjectClient {
  return overrides as unknown as OpenProjectClient;
}

describe('OpenProject target', () => {
  it('maps a work package to a work item with its project id', async () => {
    const target = createOpenProjectTarget(
      clientMock({
        getWorkPackage: vi.fn().mockResolvedValue({
          _type: 'WorkPackage',
          id: 482,
          subject: 'Login redirect',
          _links: { self: { href: '/api/v3/work_packages/482' }, project: { href: '/api/v3/projects/5', title: 'Website' } },
        }),
      }),
    );

    await expect(target.getWorkItem('482')).resolves.toEqual({ id: '482', subject: 'Login redirect', projectId: '5' });
  });

  it('keeps only exact name matches from fuzzy lookups', async () => {
    const target = createOpenProjectTarget(
      clientMock({
        findUsers: vi.fn().mockResolvedValue([
          { _type: 'User', id: 7, name: 'Jane Doe-Smith' },
          { _type: 'User', id: 8, name: 'Jane Doe' },
        ]),
        findProjects: vi.fn().mockResolvedValue([{ _type: 'Project', id: 5, name: 'Website relaunch', identifier: 'website' }]),
      }),
    );

    await expect(target.findUserByName('jane doe')).resolves.toBe('8');
    await expect(target.findProjectByName('Website')).resolves.toBe('5');
    await expect(target.findProjectByName('Intranet')).resolves.toBeNull();
  });

  it('exposes comments of existing time entries', async () => {
    const target = createOpenProjectTarget(
      clientMock({
        listTimeEntries: vi.fn().mockResolvedValue([
          { _type: 'TimeEntry', id: 11, comment: { raw: '3100000001 - Fix login' }, spentOn: '2024-03-04', hours: 'PT1H', _links: {} },
          { _type: 'TimeEntry', id: 12, comment: null, spentOn: '2024-03-04', hours: 'PT1H', _links: {} },
        ]),
      }),
    );

    await expect(target.listWorkTimeRecords('482')).resolves.toEqual([
      { id: '11', workItemId: '482', comment: '3100000001 - Fix login' },
      { id: '12', workItemId: '482', comment: '' },
    ]);
  });

  it('creates a time entry and returns its id', async () => {
    const createTimeEntry = vi.fn().mockResolvedValue({ id: 901 });
    const target = createOpenProjectTarget(clientMock({ createTimeEntry }));

    const id = await target.createWorkTimeRecord({
      workItemId: '482',
      projectId: '5',
      userId: '8',
      activityId: '3',
      spentOn: '2024-03-04',
      durationSeconds: 3600,
      comment: '3100000001 - Fix login',
    });

    expect(id).toBe('901');
    expect(createTimeEntry).toHaveBeenCalledWith({
      _links: {
        workPackage: { href: '/api/v3/work_packages/482' },
        project: { href: '/api/v3/projects/5' },
        user: { href: '/api/v3/users/8' },
        activity: { href: '/api/v3/time_entries/activities/3' },
      },
      hours: 'PT3600S',
      spentOn: '2024-03-04',
      comment: { raw: '3100000001 - Fix login' },
    });
  });
});

describe('buildTimeEntryRequest', () => {
  it('omits the activity link when none is configured', () => {
    const request = buildTimeEntryRequest({
      workItemId: '1',
      projectId: '2',
      userId: '3',
      spentOn: '2024-03-04',
      durationSeconds: 90.4,
      comment: 'x',
    });

    expect(request._links.activity).toBeUndefined();
    expect(request.hours).toBe('PT90S');
  });
});
