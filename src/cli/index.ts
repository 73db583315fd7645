#!/usr/bin/env node
/**
 * stacksmith CLI entry point.
 */

import { loadConfig } from '../core/config.js';
import { errorMessage } from '../core/errors.js';
import { closeLogger, getLogger, initLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { createProgram } from './program.js';

initLogger(loadConfig().logging);

try {
  await createProgram().parseAsync(process.argv);
} catch (err) {
  getLogger('cli').error({ err }, 'Unhandled error');
  process.stderr.write(`❌ Error: ${errorMessage(err)}\n`);
  process.exitCode = ExitCode.GENERAL_ERROR;
} finally {
  closeLogger();
}
