#!/usr/bin/env node
import { main } from '../cli.js';
import { logger } from '../utils/logger.js';

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    logger.cli.error('Unexpected failure', { error });
    process.exitCode = 1;
  }
);
