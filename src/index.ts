#!/usr/bin/env node
import { program } from './cli.js';
import { logger } from './ui/logger.js';
import { UserCancelledError, errorMessage } from './utils/errors.js';

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof UserCancelledError) {
    logger.dim(error.message);
    process.exitCode = 130;
    return;
  }
  logger.error(errorMessage(error));
  if (process.env.DEBUG && error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
  process.exitCode = 1;
});
