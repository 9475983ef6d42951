import { Command, InvalidArgumentError } from 'commander';
import type { ImportCommandFlags } from './commands/import.js';

function parsePositiveInt(name: string, min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(`${name} must be an integer >= ${min}`);
    }

    return parsed;
  };
}

function parseDate(value: string): string {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    throw new InvalidArgumentError('expected YYYY-MM-DD');
  }

  return value;
}

export function buildProgram(action: (flags: ImportCommandFlags) => Promise<void>): Command {
  const program = new Command();

  program
    .name('timelog-import')
    .description('Import Toggl Track time entries into OpenProject work packages')
    .option('--since <date>', 'first day to import (YYYY-MM-DD)', parseDate)
    .option('--until <date>', 'last day to import (YYYY-MM-DD), defaults to today', parseDate)
    .option('--days <n>', 'import the last N days (default 2)', parsePositiveInt('--days', 0))
    .option('--workspace <id>', 'Toggl workspace id, overrides TOGGL_WORKSPACE_ID', parsePositiveInt('--workspace', 1))
    .option('--dry-run', 'resolve and dedup everything but create nothing', false)
    .option('--concurrency <n>', 'entries processed at once, overrides IMPORT_CONCURRENCY', parsePositiveInt('--concurrency', 1))
    .action(async (flags: ImportCommandFlags) => {
      await action(flags);
    });

  return program;
}
