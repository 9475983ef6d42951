import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';

interface SerializedError {
  name?: string;
  message: string;
  stack?: string;
}

export function serializeError(error: unknown): SerializedError {
  if (error instanceof Error) {
    return {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  return {
    message: String(error),
  };
}

export interface WithRunLoggerOptions<TResult> {
  logger: Logger;
  runId?: string;
  context?: Record<string, unknown>;
  summary?: (result: TResult) => Record<string, unknown>;
  run: () => Promise<TResult>;
}

export async function withRunLogger<TResult>({
  logger,
  runId = randomUUID(),
  context,
  summary,
  run,
}: WithRunLoggerOptions<TResult>): Promise<TResult> {
  const startedAt = Date.now();
  const common = {
    runId,
    ...context,
  };

  logger.info(
    {
      event: 'run_started',
      ...common,
    },
    'Import started',
  );

  try {
    const result = await run();
    logger.info(
      {
        event: 'run_completed',
        ...common,
        durationMs: Date.now() - startedAt,
        ...(summary ? summary(result) : {}),
      },
      'Import completed',
    );
    return result;
  } catch (error) {
    logger.error(
      {
        event: 'run_failed',
        ...common,
        durationMs: Date.now() - startedAt,
        error: serializeError(error),
      },
      'Import failed',
    );
    throw error;
  }
}
