import type { ImportLogger } from '@timelog/importer';
import type { Logger } from 'pino';

export function createImportLogger(logger: Logger): ImportLogger {
  return {
    info: (message) => logger.debug({ event: 'import_stage' }, message),
    warn: (message) => logger.warn({ event: 'import_stage' }, message),
    error: (message) => logger.error({ event: 'import_stage' }, message),
  };
}
