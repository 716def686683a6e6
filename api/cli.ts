#!/usr/bin/env node
import 'dotenv/config';
import { hideBin } from 'yargs/helpers';
import { main } from './main.js';
import { errorMessage } from './utils/errors.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('cli');

main(hideBin(process.argv))
  .then(code => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    logger.debug('Unhandled failure', { stack: err instanceof Error ? err.stack : undefined });
    console.error(`Error: ${errorMessage(err)}`);
    process.exitCode = 1;
  });
