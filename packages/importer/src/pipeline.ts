import {
  FatalSourceError,
  SourceUnavailableError,
  TransientApiError,
  errorMessage,
  type DateRange,
  type SourceEntry,
  type TimeSource,
} from '@timelog/sync-sdk';
import { CatalogCache, CatalogResolver } from './catalog.js';
import { ImportCommitter } from './commit.js';
import { DedupGuard } from './dedup.js';
import { resolveDurationSeconds } from './duration.js';
import { parseWorkItemReference } from './reference.js';
import { summarizeOutcomes } from './report.js';
import type {
  DurationSource,
  ImportDependencies,
  ImportLogger,
  ImportOptions,
  ImportOutcome,
  ImportReport,
} from './types.js';

const DEFAULT_CONCURRENCY = 4;
const DEFAULT_MIN_DURATION_SECONDS = 60;

const defaultLogger: ImportLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

interface RunContext {
  resolver: CatalogResolver;
  guard: DedupGuard;
  committer: ImportCommitter;
  durationSource: DurationSource;
  minDurationSeconds: number;
}

async function* readSource(source: TimeSource, range: DateRange): AsyncGenerator<SourceEntry> {
  try {
    yield* source.entries(range);
  } catch (error) {
    if (error instanceof FatalSourceError) {
      throw error;
    }

    throw new SourceUnavailableError(source.manifest.id, `${source.manifest.name} failed: ${errorMessage(error)}`, error);
  }
}

/**
 * Drive one entry to its terminal outcome.
 * Stages: duration filters → parse → resolve → dedup → commit
 * Never throws: anything unexpected becomes a `failed` outcome.
 */
async function processEntry(entry: SourceEntry, ctx: RunContext): Promise<ImportOutcome> {
  try {
    const reference = parseWorkItemReference(entry.description);

    const durationSeconds = resolveDurationSeconds(entry, ctx.durationSource);
    if (durationSeconds === null) {
      return { kind: 'skipped-unresolved', entry, reason: 'EntryRunning', detail: 'entry has no stop time yet' };
    }

    if (durationSeconds < ctx.minDurationSeconds) {
      return {
        kind: 'skipped-unresolved',
        entry,
        reason: 'DurationTooShort',
        detail: `${durationSeconds}s is below the ${ctx.minDurationSeconds}s minimum`,
      };
    }

    const resolution = await ctx.resolver.resolve(reference, entry);
    if (resolution.status === 'unresolved') {
      return { kind: 'skipped-unresolved', entry, reason: resolution.reason, detail: resolution.detail };
    }

    const { target } = resolution;
    const admitted = await ctx.guard.admit(entry, target, () =>
      ctx.committer.commit(entry, reference, target, durationSeconds),
    );

    switch (admitted.status) {
      case 'duplicate':
        return { kind: 'skipped-duplicate', entry, target, fingerprint: admitted.fingerprint };
      case 'committed':
        return { kind: 'imported', entry, target, fingerprint: admitted.fingerprint, recordId: admitted.recordId };
      case 'failed':
        return { kind: 'failed', entry, target, error: admitted.error, attempts: admitted.attempts };
    }
  } catch (error) {
    return {
      kind: 'failed',
      entry,
      error: errorMessage(error),
      attempts: error instanceof TransientApiError ? error.attempts : 1,
    };
  }
}

/**
 * Import every entry of `range` from the source into the target.
 * Entries run concurrently up to `concurrency`; the catalog cache and
 * fingerprint sets are shared by all of them and live only for this run.
 * Only source failures abort the run, after in-flight entries settle.
 */
export async function runImport(
  deps: ImportDependencies,
  range: DateRange,
  options: ImportOptions = {},
): Promise<ImportReport> {
  const { source, target } = deps;
  const { logger = defaultLogger, dryRun = false } = options;
  const { id } = source.manifest;
  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const start = performance.now();

  const ctx: RunContext = {
    resolver: new CatalogResolver(target, new CatalogCache(), options.aliases),
    guard: new DedupGuard(target),
    committer: new ImportCommitter(target, { dryRun, policy: options.commit, logger }),
    durationSource: options.durationSource ?? 'reported',
    minDurationSeconds: options.minDurationSeconds ?? DEFAULT_MIN_DURATION_SECONDS,
  };

  const outcomes: ImportOutcome[] = [];
  const inFlight = new Set<Promise<void>>();
  let fetched = 0;

  logger.info(`[import:${id}] Fetching entries from ${range.startDate} to ${range.endDate}${dryRun ? ' (dry run)' : ''}...`);

  try {
    for await (const entry of readSource(source, range)) {
      const position = fetched;
      fetched += 1;

      const task: Promise<void> = processEntry(entry, ctx)
        .then((outcome) => {
          outcomes[position] = outcome;
          options.onOutcome?.(outcome, position);
        })
        .finally(() => {
          inFlight.delete(task);
        });
      inFlight.add(task);

      if (inFlight.size >= concurrency) {
        await Promise.race(inFlight);
      }
    }

    await Promise.all(inFlight);
  } catch (error) {
    await Promise.allSettled(inFlight);
    logger.error(`[import:${id}] Aborted after ${fetched} entries: ${errorMessage(error)}`);
    throw error;
  }

  const summary = summarizeOutcomes(outcomes);
  logger.info(
    `[import:${id}] Done. ${summary.imported} imported, ${summary.skippedDuplicate} duplicate, ${summary.skippedUnresolved} unresolved, ${summary.failed} failed.`,
  );

  if (summary.failed > 0) {
    logger.warn(`[import:${id}] ${summary.failed} entries failed to import`);
  }

  return {
    outcomes,
    summary,
    dryRun,
    durationMs: performance.now() - start,
    catalogLookups: ctx.resolver.lookups,
    dedupLookups: ctx.guard.lookups,
  };
}
