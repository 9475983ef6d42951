import { describe, expect, it, vi } from 'vitest';
import { ApiHttpError } from '@timelog/sync-sdk';
import { OpenProjectClient, buildApiBaseUrl, idFromHref } from '../src/client.js';
import type { OpTimeEntry } from '../src/types.js';

function createClient(fetchImpl: unknown, pageSize = 100): OpenProjectClient {
  return new OpenProjectClient({
    baseUrl: 'https://op.test/api/v3',
    apiKey: 'test-key',
    baseDelayMs: 0,
    jitterMs: 0,
    maxRetries: 2,
    pageSize,
    fetchImpl: fetchImpl as typeof fetch,
  });
}

function timeEntry(id: number, comment: string): OpTimeEntry {
  return {
    _type: 'TimeEntry',
    id,
    comment: { raw: comment },
    spentOn: '2024-03-04',
    hours: 'PT1H',
    _links: {},
  };
}

function collection<T>(elements: T[], total: number, offset: number, pageSize: number) {
  return {
    _type: 'Collection',
    total,
    count: elements.length,
    pageSize,
    offset,
    _embedded: { elements },
  };
}

describe('OpenProject client', () => {
  it('authenticates with the apikey user', async () => {
    const fetchMock = vi.fn(
      async () =>
        new Response(
          JSON.stringify({ _type: 'WorkPackage', id: 482, subject: 'Login', _links: { self: { href: '/api/v3/work_packages/482' }, project: { href: '/api/v3/projects/5' } } }),
        ),
    );
    const client = createClient(fetchMock);

    const workPackage = await client.getWorkPackage('482');

    expect(workPackage?.subject).toBe('Login');
    const call = fetchMock.mock.calls.at(0) as unknown[] | undefined;
    expect(call?.[0]).toBe('https://op.test/api/v3/work_packages/482');
    const init = call?.[1] as { headers?: Record<string, string> } | undefined;
    expect(init?.headers?.Authorization).toBe(`Basic ${Buffer.from('apikey:test-key').toString('base64')}`);
  });

  it('returns null for a missing work package', async () => {
    const fetchMock = vi.fn(async () => new Response('not found', { status: 404 }));
    const client = createClient(fetchMock);

    await expect(client.getWorkPackage('999')).resolves.toBeNull();
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('pages through time entries of a work package', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response(JSON.stringify(collection([timeEntry(1, 'a'), timeEntry(2, 'b')], 3, 1, 2))))
      .mockResolvedValueOnce(new Response(JSON.stringify(collection([timeEntry(3, 'c')], 3, 2, 2))));
    const client = createClient(fetchMock, 2);

    const entries = await client.listTimeEntries('482');

    expect(entries.map((entry) => entry.id)).toEqual([1, 2, 3]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
    const secondUrl = String(fetchMock.mock.calls[1]![0]);
    expect(secondUrl).toContain('/time_entries?pageSize=2&offset=2&filters=');
    const filters = JSON.parse(decodeURIComponent(secondUrl.split('filters=')[1]!)) as unknown;
    expect(filters).toEqual([{ work_package: { operator: '=', values: ['482'] } }]);
  });

  it('retries lookups on server errors', async () => {
    const fetchMock = vi
      .fn()
      .mockResolvedValueOnce(new Response('oops', { status: 500 }))
      .mockResolvedValueOnce(new Response(JSON.stringify(collection([], 0, 1, 100))));
    const client = createClient(fetchMock);

    await expect(client.findUsers('Jane Doe')).resolves.toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(2);
  });

  it('never retries a create on its own', async () => {
    const fetchMock = vi.fn(async () => new Response('slow down', { status: 429 }));
    const client = createClient(fetchMock);

    await expect(
      client.createTimeEntry({
        _links: {
          workPackage: { href: '/api/v3/work_packages/1' },
          project: { href: '/api/v3/projects/1' },
          user: { href: '/api/v3/users/1' },
        },
        hours: 'PT60S',
        spentOn: '2024-03-04',
        comment: { raw: '1 - test' },
      }),
    ).rejects.toBeInstanceOf(ApiHttpError);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('OpenProject helpers', () => {
  it('builds the API root from host and schema', () => {
    expect(buildApiBaseUrl('op.example.com')).toBe('https://op.example.com/api/v3');
    expect(buildApiBaseUrl('localhost:8080/', 'http')).toBe('http://localhost:8080/api/v3');
  });

  it('reads ids from hrefs', () => {
    expect(idFromHref('/api/v3/projects/5')).toBe('5');
    expect(idFromHref(null)).toBeNull();
  });
});
