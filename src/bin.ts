#!/usr/bin/env node
import { main } from './cli.js';
import { logger } from './shared/logger.js';

main(process.argv.slice(2))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Fatal error');
    process.exit(1);
  });
