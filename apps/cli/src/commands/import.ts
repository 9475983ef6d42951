import {
  describeOutcome,
  formatReport,
  runImport,
  type ImportReport,
  type ImportOptions,
} from '@timelog/importer';
import { OpenProjectClient, buildApiBaseUrl, createOpenProjectTarget } from '@timelog/openproject';
import {
  FatalSourceError,
  errorMessage,
  type DateRange,
  type TargetService,
  type TimeSource,
} from '@timelog/sync-sdk';
import { TogglClient, createTogglSource } from '@timelog/toggl';
import type { Logger } from 'pino';
import { ConfigError, parseConfig, type ImportConfig } from '../config.js';
import { UsageError, resolveDateRange, type DateRangeFlags } from '../date-range.js';
import { createImportLogger } from '../observability/import-logger.js';
import { withRunLogger } from '../observability/with-run-logger.js';

export interface ImportCommandFlags extends DateRangeFlags {
  workspace?: number;
  dryRun?: boolean;
  concurrency?: number;
}

export interface ImportCommandDeps {
  logger: Logger;
  env?: NodeJS.ProcessEnv;
  write?: (line: string) => void;
  now?: () => Date;
  createSource?: (config: ImportConfig, logger: Logger) => TimeSource;
  createTarget?: (config: ImportConfig, logger: Logger) => TargetService;
}

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

function writeStdout(line: string): void {
  process.stdout.write(`${line}\n`);
}

export function createTogglTimeSource(config: ImportConfig, logger: Logger): TimeSource {
  const client = new TogglClient({
    apiToken: config.TOGGL_API_TOKEN,
    baseUrl: config.TOGGL_BASE_URL,
    maxRetries: config.IMPORT_MAX_RETRIES,
    onRetry: (error, attempt, waitMs) => {
      logger.warn({ event: 'toggl_retry', attempt: attempt + 1, waitMs, error: errorMessage(error) }, 'Retrying Toggl request');
    },
  });

  return createTogglSource(client, {
    workspaceId: config.TOGGL_WORKSPACE_ID,
    onInvalid: (issues, entry) => {
      logger.warn({ event: 'source_entry_invalid', issues, entry }, 'Dropped malformed time entry');
    },
    onProjectUnavailable: (projectId, error) => {
      logger.warn(
        { event: 'source_project_unavailable', projectId, status: error.status },
        'Toggl project is not readable; its entries will not map to a target project',
      );
    },
  });
}

export function createOpenProjectTargetService(config: ImportConfig, logger: Logger): TargetService {
  const client = new OpenProjectClient({
    baseUrl: buildApiBaseUrl(config.OPENPROJECT_HOST, config.OPENPROJECT_HTTP_SCHEMA),
    apiKey: config.OPENPROJECT_API_KEY,
    maxRetries: config.IMPORT_MAX_RETRIES,
    onRetry: (error, attempt, waitMs) => {
      logger.warn(
        { event: 'openproject_retry', attempt: attempt + 1, waitMs, error: errorMessage(error) },
        'Retrying OpenProject request',
      );
    },
  });

  return createOpenProjectTarget(client);
}

function readInvocation(
  flags: ImportCommandFlags,
  deps: ImportCommandDeps,
): { config: ImportConfig; range: DateRange } | ConfigError | UsageError {
  try {
    const config = parseConfig(deps.env ?? process.env);
    const range = resolveDateRange(flags, deps.now?.() ?? new Date());

    return {
      config: flags.workspace === undefined ? config : { ...config, TOGGL_WORKSPACE_ID: flags.workspace },
      range,
    };
  } catch (error) {
    if (error instanceof ConfigError || error instanceof UsageError) {
      return error;
    }

    throw error;
  }
}

/**
 * Run one import and print the report. Returns the process exit code:
 * 1 for bad configuration or arguments and for source failures, 0 otherwise
 * (per-entry failures are part of the report).
 */
export async function runImportCommand(flags: ImportCommandFlags, deps: ImportCommandDeps): Promise<number> {
  const { logger } = deps;
  const write = deps.write ?? writeStdout;

  const invocation = readInvocation(flags, deps);
  if (invocation instanceof Error) {
    logger.error({ event: 'invalid_invocation', error: invocation.message }, 'Invalid invocation');
    write(invocation.message);
    return EXIT_FAILURE;
  }

  const { config, range } = invocation;

  const dryRun = flags.dryRun ?? false;
  const source = (deps.createSource ?? createTogglTimeSource)(config, logger);
  const target = (deps.createTarget ?? createOpenProjectTargetService)(config, logger);
  const options: ImportOptions = {
    dryRun,
    concurrency: flags.concurrency ?? config.IMPORT_CONCURRENCY,
    durationSource: config.IMPORT_DURATION_SOURCE,
    minDurationSeconds: config.IMPORT_MIN_DURATION_SECONDS,
    aliases: {
      users: config.IMPORT_USER_ALIASES,
      projects: config.IMPORT_PROJECT_ALIASES,
    },
    commit: {
      maxRetries: config.IMPORT_MAX_RETRIES,
      activityId: config.OPENPROJECT_DEFAULT_ACTIVITY_ID,
    },
    logger: createImportLogger(logger),
    onOutcome: (outcome) => write(describeOutcome(outcome, dryRun)),
  };

  let report: ImportReport;
  try {
    report = await withRunLogger({
      logger,
      context: {
        sourceId: source.manifest.id,
        startDate: range.startDate,
        endDate: range.endDate,
        dryRun,
      },
      summary: (result: ImportReport) => ({
        ...result.summary,
        catalogLookups: result.catalogLookups,
        dedupLookups: result.dedupLookups,
      }),
      run: () => runImport({ source, target }, range, options),
    });
  } catch (error) {
    if (error instanceof FatalSourceError) {
      write(`Import aborted: ${error.message}`);
      return EXIT_FAILURE;
    }

    throw error;
  }

  for (const line of formatReport(report)) {
    write(line);
  }

  return EXIT_OK;
}
