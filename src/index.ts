#!/usr/bin/env node
/**
 * @fileoverview Executable entry point for account-brief.
 *
 * Validates configuration, runs the CLI and maps its result to the exit
 * code. Log sinks are flushed before the process ends.
 */

import { hideBin } from 'yargs/helpers';
import config, { validateConfig } from './config.js';
import { runCli } from './cli.js';
import { serializeError } from './services/output/serializer.js';
import { errorMessage } from './utils/errors.js';
import { closeLogSinks } from './utils/observability/index.js';

async function main(): Promise<number> {
  try {
    validateConfig();
  } catch (error) {
    process.stdout.write(serializeError(errorMessage(error)));
    return 1;
  }
  return runCli(hideBin(process.argv), { config });
}

main()
  .then((code) => {
    closeLogSinks();
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stdout.write(serializeError(errorMessage(error)));
    process.exitCode = 1;
  });
