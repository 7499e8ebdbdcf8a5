/**
 * CLI entry point for catch-the-block
 */

import { runCli } from './app';
import { createLogger } from './logger';

const log = createLogger('CLI');

runCli(process.argv.slice(2)).then(
  (code) => process.exit(code),
  (error: unknown) => {
    log.error(error instanceof Error ? (error.stack ?? error.message) : String(error));
    process.exit(1);
  },
);
