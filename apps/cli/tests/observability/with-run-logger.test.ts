import type { Logger } from 'pino';
import { describe, expect, it, vi } from 'vitest';
import { withRunLogger } from '../../src/observability/with-run-logger.js';

function createLoggerMock(): Logger {
  return {
    info: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

describe('withRunLogger', () => {
  it('logs start/completion and returns the run result', async () => {
    const logger = createLoggerMock();

    const result = await withRunLogger({
      logger,
      runId: 'run-1',
      context: { sourceId: 'toggl', dryRun: false },
      summary: (value: { imported: number }) => ({ imported: value.imported }),
      run: async () => ({ imported: 5 }),
    });

    expect(result).toEqual({ imported: 5 });
    expect(vi.mocked(logger.info)).toHaveBeenCalledTimes(2);

    const [startPayload] = vi.mocked(logger.info).mock.calls[0]!;
    expect(startPayload).toEqual({ event: 'run_started', runId: 'run-1', sourceId: 'toggl', dryRun: false });

    const [completedPayload] = vi.mocked(logger.info).mock.calls[1]!;
    expect(completedPayload).toMatchObject({
      event: 'run_completed',
      runId: 'run-1',
      sourceId: 'toggl',
      imported: 5,
    });
  });

  it('logs failure and rethrows', async () => {
    const logger = createLoggerMock();

    await expect(
      withRunLogger({
        logger,
        runId: 'run-2',
        run: async () => {
          throw new Error('Toggl is unavailable');
        },
      }),
    ).rejects.toThrow('Toggl is unavailable');

    expect(vi.mocked(logger.error)).toHaveBeenCalledTimes(1);
    const [failedPayload] = vi.mocked(logger.error).mock.calls[0]!;
    expect(failedPayload).toMatchObject({
      event: 'run_failed',
      runId: 'run-2',
      error: { name: 'Error', message: 'Toggl is unavailable' },
    });
  });
});
