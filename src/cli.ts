#!/usr/bin/env node

import { EXIT } from './commands/exit-codes';
import { runCli } from './commands/program';
import { createClusterContext } from './context';
import { logger } from './logger';

// Command output goes to stdout; keep the controller's log chatter out of it.
if (!process.env.LOG_LEVEL) {
  logger.level = 'warn';
}

runCli(process.argv.slice(2), {
  context: createClusterContext,
  out: (text) => process.stdout.write(text),
  err: (text) => process.stderr.write(text),
})
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.error(`Unexpected failure: ${err}`);
    process.exitCode = EXIT.SYNC_FAILED;
  });
