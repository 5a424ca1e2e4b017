#!/usr/bin/env tsx

/**
 * trainlaunch CLI Entry Point
 *
 * trainlaunch --pathCheckpoint <dir> [training arguments...]
 *
 * Every argument, --pathCheckpoint included, is forwarded to the training
 * process after the preset's fixed hyperparameters.
 */

import 'dotenv/config';
import { logger } from '@trainlaunch/utils';
import { runCli } from '../core/run-cli.js';

runCli(process.argv.slice(2), process.argv[1] ?? 'trainlaunch')
  .then((exitCode) => {
    // exitCode rather than exit(): let stdout drain the child's last chunks
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logger.error('Unhandled error in CLI', error);
    process.exit(1);
  });
