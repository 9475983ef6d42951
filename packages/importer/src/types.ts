import type { SourceEntry, TargetService, TimeSource } from '@timelog/sync-sdk';

/**
 * Work-item reference found in an entry description.
 * `canonicalId` is null when the description carries no reference.
 */
export interface WorkItemReference {
  rawToken: string;
  canonicalId: string | null;
  /** Text that goes into the target comment. */
  remainder: string;
}

export interface ResolvedTarget {
  workItemId: string;
  targetUserId: string;
  targetProjectId: string;
}

export type UnresolvedReason =
  | 'NoReferenceFound'
  | 'WorkItemNotFound'
  | 'UserNotMapped'
  | 'ProjectNotMapped'
  | 'EntryRunning'
  | 'DurationTooShort';

export type Resolution =
  | { status: 'resolved'; target: ResolvedTarget }
  | { status: 'unresolved'; reason: UnresolvedReason; detail: string };

export type DedupVerdict = { status: 'duplicate'; fingerprint: string } | { status: 'new'; fingerprint: string };

export type CommitResult =
  | { status: 'committed'; recordId: string | null }
  | { status: 'failed'; error: string; attempts: number };

export type AdmitResult = { status: 'duplicate'; fingerprint: string } | (CommitResult & { fingerprint: string });

/**
 * Terminal state of a single source entry. The list of outcomes is the run's audit trail.
 */
export type ImportOutcome =
  | { kind: 'imported'; entry: SourceEntry; target: ResolvedTarget; fingerprint: string; recordId: string | null }
  | { kind: 'skipped-duplicate'; entry: SourceEntry; target: ResolvedTarget; fingerprint: string }
  | { kind: 'skipped-unresolved'; entry: SourceEntry; reason: UnresolvedReason; detail: string }
  | { kind: 'failed'; entry: SourceEntry; error: string; attempts: number; target?: ResolvedTarget };

export type OutcomeKind = ImportOutcome['kind'];

export interface ImportSummary {
  fetched: number;
  imported: number;
  skippedDuplicate: number;
  skippedUnresolved: number;
  failed: number;
}

export interface ImportReport {
  outcomes: ImportOutcome[];
  summary: ImportSummary;
  dryRun: boolean;
  durationMs: number;
  /** Remote catalog lookups (work items, users, projects). */
  catalogLookups: number;
  /** Work items whose existing records were listed for dedup. */
  dedupLookups: number;
}

export type DurationSource = 'reported' | 'timestamps';

export interface NameAliases {
  users?: Record<string, string>;
  projects?: Record<string, string>;
}

export interface CommitPolicy {
  maxRetries?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  jitterMs?: number;
  activityId?: string;
  sleep?: (ms: number) => Promise<void>;
}

export interface ImportOptions {
  dryRun?: boolean;
  concurrency?: number;
  durationSource?: DurationSource;
  minDurationSeconds?: number;
  aliases?: NameAliases;
  commit?: CommitPolicy;
  logger?: ImportLogger;
  onOutcome?: (outcome: ImportOutcome, index: number) => void;
}

export interface ImportDependencies {
  source: TimeSource;
  target: TargetService;
}

/**
 * Minimal logger interface — defaults to console.
 */
export interface ImportLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}
