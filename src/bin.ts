#!/usr/bin/env node
import { createProgram, EXIT_CODES } from './cli.js';
import { logger } from './logger.js';

createProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    logger.error({ err }, err instanceof Error ? err.message : 'Command failed');
    process.exitCode = EXIT_CODES.error;
  });
