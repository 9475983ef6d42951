import {
  TransientApiError,
  errorMessage,
  withRetry,
  type SourceEntry,
  type TargetService,
  type WorkTimeDraft,
} from '@timelog/sync-sdk';
import { formatComment } from './comment.js';
import { spentOnDate } from './duration.js';
import type { CommitPolicy, CommitResult, ImportLogger, ResolvedTarget, WorkItemReference } from './types.js';

const DEFAULT_MAX_RETRIES = 3;

export function buildWorkTimeDraft(
  entry: SourceEntry,
  reference: WorkItemReference,
  target: ResolvedTarget,
  durationSeconds: number,
  activityId?: string,
): WorkTimeDraft {
  return {
    workItemId: target.workItemId,
    projectId: target.targetProjectId,
    userId: target.targetUserId,
    activityId,
    spentOn: spentOnDate(entry),
    durationSeconds,
    comment: formatComment(entry.sourceId, reference.remainder),
  };
}

export interface ImportCommitterOptions {
  dryRun?: boolean;
  policy?: CommitPolicy;
  logger?: ImportLogger;
}

/**
 * Writes work-time records to the target. Transient failures are retried with
 * exponential backoff; what is left after the budget becomes a `failed` result.
 * Dry-run builds the draft and stops before the network call.
 */
export class ImportCommitter {
  private readonly target: TargetService;
  private readonly dryRun: boolean;
  private readonly policy: CommitPolicy;
  private readonly logger?: ImportLogger;

  constructor(target: TargetService, options: ImportCommitterOptions = {}) {
    this.target = target;
    this.dryRun = options.dryRun ?? false;
    this.policy = options.policy ?? {};
    this.logger = options.logger;
  }

  async commit(
    entry: SourceEntry,
    reference: WorkItemReference,
    target: ResolvedTarget,
    durationSeconds: number,
  ): Promise<CommitResult> {
    if (this.dryRun) {
      return { status: 'committed', recordId: null };
    }

    const draft = buildWorkTimeDraft(entry, reference, target, durationSeconds, this.policy.activityId);

    let attempts = 0;
    try {
      const recordId = await withRetry(
        (attempt) => {
          attempts = attempt + 1;
          return this.target.createWorkTimeRecord(draft);
        },
        {
          label: `commit of entry ${entry.sourceId}`,
          maxRetries: this.policy.maxRetries ?? DEFAULT_MAX_RETRIES,
          baseDelayMs: this.policy.baseDelayMs,
          maxDelayMs: this.policy.maxDelayMs,
          jitterMs: this.policy.jitterMs,
          sleep: this.policy.sleep,
          onRetry: (error, attempt, waitMs) => {
            this.logger?.warn(
              `[import:commit] entry ${entry.sourceId} attempt ${attempt + 1} failed (${errorMessage(error)}), retrying in ${waitMs}ms`,
            );
          },
        },
      );

      return { status: 'committed', recordId };
    } catch (error) {
      return {
        status: 'failed',
        error: errorMessage(error),
        attempts: error instanceof TransientApiError ? error.attempts : attempts,
      };
    }
  }
}
