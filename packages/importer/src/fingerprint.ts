import { createHash } from 'node:crypto';
import type { SourceEntry } from '@timelog/sync-sdk';
import type { ResolvedTarget } from './types.js';

/**
 * SHA-256 of source entry id and target work item. Stable across runs,
 * so re-importing an overlapping range finds the same keys.
 */
export function computeFingerprint(sourceId: string, workItemId: string): string {
  const input = [sourceId.trim(), workItemId.trim()].join('|');
  return createHash('sha256').update(input).digest('hex');
}

export function fingerprintEntry(entry: SourceEntry, target: ResolvedTarget): string {
  return computeFingerprint(entry.sourceId, target.workItemId);
}
