import { buildProgram } from './cli.js';
import { EXIT_FAILURE, runImportCommand } from './commands/import.js';
import { loadEnvFiles } from './config.js';
import { createCliLogger } from './observability/logger.js';
import { serializeError } from './observability/with-run-logger.js';

loadEnvFiles();
const logger = createCliLogger();

const program = buildProgram(async (flags) => {
  process.exitCode = await runImportCommand(flags, { logger });
});

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal(
    {
      event: 'cli_fatal_error',
      error: serializeError(error),
    },
    'Import crashed',
  );
  process.exitCode = EXIT_FAILURE;
});
