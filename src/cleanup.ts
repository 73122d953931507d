#!/usr/bin/env node

import dotenv from 'dotenv';
import { CommanderError } from 'commander';
import { runCli } from './cli/cleanup';
import { ConfigurationError } from './utils/errors';
import { logger } from './utils/logger';

// Load environment variables from .env when present
dotenv.config();

runCli(process.argv.slice(2)).then(() => {
  process.exit(0);
}).catch((error: unknown) => {
  if (error instanceof CommanderError) {
    process.exit(error.exitCode);
  }
  if (error instanceof ConfigurationError) {
    logger.error(error.message, error.cause);
  } else {
    logger.error('Unhandled error', error);
  }
  process.exit(1);
});
