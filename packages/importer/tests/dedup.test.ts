import { describe, expect, it, vi } from 'vitest';
import { DedupGuard } from '../src/dedup.js';
import type { CommitResult } from '../src/types.js';
import { MemoryTarget, makeEntry, tick } from './helpers/fakes.js';

const target = { workItemId: '482', targetUserId: '8', targetProjectId: '5' };

describe('DedupGuard', () => {
  it('flags entries whose source id already sits on the work item', async () => {
    const memory = new MemoryTarget().withRecord('482', 't1 - Fixed bug #482').withRecord('482', 'manual entry');
    const guard = new DedupGuard(memory);

    await expect(guard.check(makeEntry({ sourceId: 't1' }), target)).resolves.toMatchObject({ status: 'duplicate' });
    await expect(guard.check(makeEntry({ sourceId: 'manual' }), target)).resolves.toMatchObject({ status: 'new' });
    expect(memory.calls.listWorkTimeRecords).toEqual(['482']);
  });

  it('tells earlier source ids apart from new ones', async () => {
    const memory = new MemoryTarget().withRecord('482', '3100000001 - Fix login');
    const guard = new DedupGuard(memory);

    const duplicate = await guard.check(makeEntry({ sourceId: '3100000001' }), target);
    const fresh = await guard.check(makeEntry({ sourceId: '3100000002' }), target);

    expect(duplicate.status).toBe('duplicate');
    expect(fresh.status).toBe('new');
    expect(memory.calls.listWorkTimeRecords).toEqual(['482']);
    expect(guard.lookups).toBe(1);
  });

  it('does not count a record on another work item', async () => {
    const memory = new MemoryTarget().withRecord('483', '3100000001 - Fix login');
    const guard = new DedupGuard(memory);

    await expect(guard.check(makeEntry({ sourceId: '3100000001' }), target)).resolves.toMatchObject({ status: 'new' });
  });

  it('commits a fingerprint at most once under concurrent admits', async () => {
    const guard = new DedupGuard(new MemoryTarget());
    const commit = vi.fn(async (): Promise<CommitResult> => {
      await tick();
      return { status: 'committed', recordId: '901' };
    });
    const entry = makeEntry({ sourceId: '3100000001' });

    const results = await Promise.all([guard.admit(entry, target, commit), guard.admit({ ...entry }, target, commit)]);

    expect(commit).toHaveBeenCalledTimes(1);
    expect(results.map((result) => result.status)).toEqual(['committed', 'duplicate']);
    expect(results[0]!.fingerprint).toBe(results[1]!.fingerprint);
  });

  it('lets a later entry retry after a failed commit', async () => {
    const guard = new DedupGuard(new MemoryTarget());
    const commit = vi
      .fn<(fingerprint: string) => Promise<CommitResult>>()
      .mockResolvedValueOnce({ status: 'failed', error: 'boom', attempts: 1 })
      .mockResolvedValueOnce({ status: 'committed', recordId: '902' });
    const entry = makeEntry({ sourceId: '3100000001' });

    const first = await guard.admit(entry, target, commit);
    const second = await guard.admit(entry, target, commit);

    expect(first.status).toBe('failed');
    expect(second).toMatchObject({ status: 'committed', recordId: '902' });
  });
});
