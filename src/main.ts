/**
 * tile-bundler entry point
 */

import { runCli } from './cli';
import { logger } from './lib/logger';

const controller = new AbortController();

process.once('SIGINT', () => {
  logger.warn('Interrupted, waiting for downloads in flight to finish...');
  controller.abort();
});

runCli(process.argv.slice(2), { signal: controller.signal })
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    logger.error('Fatal error:', error);
    process.exitCode = 1;
  });
