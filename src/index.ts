#!/usr/bin/env node
import { createProgram } from './cli.js';
import { ConfigError } from './config/index.js';
import { errorMessage, logger } from './utils/logger.js';

const log = logger('Main');

// Run main
createProgram()
  .parseAsync(process.argv)
  .catch((error: unknown) => {
    if (error instanceof ConfigError) {
      log.error(error.message);
    } else {
      log.error('Fatal error', { error: errorMessage(error) });
    }
    process.exitCode = 1;
  });
