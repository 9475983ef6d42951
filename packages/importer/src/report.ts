import type { ImportOutcome, ImportReport, ImportSummary } from './types.js';

const MAX_DESCRIPTION_LENGTH = 60;

export function summarizeOutcomes(outcomes: ImportOutcome[]): ImportSummary {
  const summary: ImportSummary = {
    fetched: outcomes.length,
    imported: 0,
    skippedDuplicate: 0,
    skippedUnresolved: 0,
    failed: 0,
  };

  for (const outcome of outcomes) {
    switch (outcome.kind) {
      case 'imported':
        summary.imported += 1;
        break;
      case 'skipped-duplicate':
        summary.skippedDuplicate += 1;
        break;
      case 'skipped-unresolved':
        summary.skippedUnresolved += 1;
        break;
      case 'failed':
        summary.failed += 1;
        break;
    }
  }

  return summary;
}

function quoteDescription(description: string): string {
  const text = description.replace(/\s+/g, ' ').trim();
  if (text.length <= MAX_DESCRIPTION_LENGTH) {
    return `"${text}"`;
  }

  return `"${text.slice(0, MAX_DESCRIPTION_LENGTH - 3)}..."`;
}

/**
 * One progress line per settled entry.
 */
export function describeOutcome(outcome: ImportOutcome, dryRun = false): string {
  const id = outcome.entry.sourceId;

  switch (outcome.kind) {
    case 'imported':
      return dryRun || outcome.recordId === null
        ? `would import ${id} -> #${outcome.target.workItemId}`
        : `imported ${id} -> #${outcome.target.workItemId} (time entry ${outcome.recordId})`;
    case 'skipped-duplicate':
      return `duplicate ${id} -> #${outcome.target.workItemId}`;
    case 'skipped-unresolved':
      return `unresolved ${id}: ${outcome.reason}`;
    case 'failed':
      return `failed ${id}: ${outcome.error}`;
  }
}

/**
 * Diagnostic line for entries that need a manual fix, null for the rest.
 */
export function formatDiagnostic(outcome: ImportOutcome): string | null {
  const { entry } = outcome;
  const where = `${entry.sourceId} on ${entry.start.slice(0, 10)} ${quoteDescription(entry.description)}`;

  if (outcome.kind === 'skipped-unresolved') {
    return `[unresolved] ${where}: ${outcome.reason} (${outcome.detail})`;
  }

  if (outcome.kind === 'failed') {
    const workItem = outcome.target ? ` -> #${outcome.target.workItemId}` : '';
    return `[failed] ${where}${workItem}: ${outcome.error} (${outcome.attempts} attempt${outcome.attempts === 1 ? '' : 's'})`;
  }

  return null;
}

export function formatSummary(summary: ImportSummary, dryRun: boolean): string {
  const imported = dryRun ? `${summary.imported} would be imported` : `${summary.imported} imported`;
  const prefix = dryRun ? 'Dry run: ' : '';

  return `${prefix}${summary.fetched} entries: ${imported}, ${summary.skippedDuplicate} already imported, ${summary.skippedUnresolved} unresolved, ${summary.failed} failed`;
}

export function formatReport(report: ImportReport): string[] {
  const lines = [formatSummary(report.summary, report.dryRun)];

  for (const outcome of report.outcomes) {
    const diagnostic = formatDiagnostic(outcome);
    if (diagnostic) {
      lines.push(diagnostic);
    }
  }

  return lines;
}
