// Pipeline
export { runImport } from './pipeline.js';

// Individual stages
export { parseWorkItemReference } from './reference.js';
export { CatalogCache, CatalogResolver } from './catalog.js';
export { computeFingerprint, fingerprintEntry } from './fingerprint.js';
export { DedupGuard } from './dedup.js';
export { ImportCommitter, buildWorkTimeDraft } from './commit.js';
export type { ImportCommitterOptions } from './commit.js';
export { resolveDurationSeconds, spentOnDate } from './duration.js';
export { formatComment, extractSourceId, COMMENT_SEPARATOR } from './comment.js';
export { summarizeOutcomes, describeOutcome, formatDiagnostic, formatSummary, formatReport } from './report.js';
export { SingleFlightMap } from './single-flight.js';
export { KeyedMutex } from './keyed-mutex.js';

// Types
export type {
  WorkItemReference,
  ResolvedTarget,
  UnresolvedReason,
  Resolution,
  DedupVerdict,
  CommitResult,
  AdmitResult,
  ImportOutcome,
  OutcomeKind,
  ImportSummary,
  ImportReport,
  DurationSource,
  NameAliases,
  CommitPolicy,
  ImportOptions,
  ImportDependencies,
  ImportLogger,
} from './types.js';
