#!/usr/bin/env node
/**
 * photo-datestamp entry point
 * Usage: photo-datestamp <input_path> [-s size] [-c color] [-p position]
 */

import { hideBin } from 'yargs/helpers';
import { run } from './cli';
import { logger } from './utils/logger';

run(hideBin(process.argv))
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error) => {
    logger.error('Unexpected failure', error);
    process.exit(1);
  });
