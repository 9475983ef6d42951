import type { SourceEntry, TargetService } from '@timelog/sync-sdk';
import { extractSourceId } from './comment.js';
import { computeFingerprint, fingerprintEntry } from './fingerprint.js';
import { KeyedMutex } from './keyed-mutex.js';
import { SingleFlightMap } from './single-flight.js';
import type { AdmitResult, CommitResult, DedupVerdict, ResolvedTarget } from './types.js';

/**
 * At-most-once gate in front of the committer.
 *
 * - Existing fingerprints are loaded once per work item from the target's time entries
 * - Check-and-commit runs under a per-fingerprint lock, so two entries with the same
 *   fingerprint cannot both see "new"; entries with other fingerprints never wait on it
 * - A committed (or dry-run committed) fingerprint joins the known set for the rest of the run
 */
export class DedupGuard {
  private readonly target: TargetService;
  private readonly known = new SingleFlightMap<Set<string>>();
  private readonly locks = new KeyedMutex();

  constructor(target: TargetService) {
    this.target = target;
  }

  /** Work items whose existing records were listed. */
  get lookups(): number {
    return this.known.loadCount;
  }

  async check(entry: SourceEntry, target: ResolvedTarget): Promise<DedupVerdict> {
    const fingerprint = fingerprintEntry(entry, target);
    const known = await this.loadKnown(target.workItemId);

    return known.has(fingerprint) ? { status: 'duplicate', fingerprint } : { status: 'new', fingerprint };
  }

  /**
   * Run `commit` only if the entry is new for its work item.
   */
  admit(
    entry: SourceEntry,
    target: ResolvedTarget,
    commit: (fingerprint: string) => Promise<CommitResult>,
  ): Promise<AdmitResult> {
    const fingerprint = fingerprintEntry(entry, target);
    const known = this.loadKnown(target.workItemId);

    return this.locks.runExclusive<AdmitResult>(fingerprint, async () => {
      const fingerprints = await known;
      if (fingerprints.has(fingerprint)) {
        return { status: 'duplicate', fingerprint };
      }

      const result = await commit(fingerprint);
      if (result.status === 'committed') {
        fingerprints.add(fingerprint);
      }

      return { ...result, fingerprint };
    });
  }

  private loadKnown(workItemId: string): Promise<Set<string>> {
    return this.known.get(workItemId, async () => {
      const records = await this.target.listWorkTimeRecords(workItemId);
      const fingerprints = new Set<string>();

      for (const record of records) {
        const sourceId = extractSourceId(record.comment);
        if (sourceId) {
          fingerprints.add(computeFingerprint(sourceId, workItemId));
        }
      }

      return fingerprints;
    });
  }
}
