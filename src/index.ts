#!/usr/bin/env node

import { runCli } from './cli.js';
import { logger } from './utils/index.js';

// Handle process signals
process.on('SIGINT', () => {
  logger.info('Received SIGINT, shutting down');
  process.exit(130);
});

process.on('SIGTERM', () => {
  logger.info('Received SIGTERM, shutting down');
  process.exit(143);
});

runCli(process.argv.slice(2)).then((code) => {
  process.exitCode = code;
});
