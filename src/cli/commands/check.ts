/**
 * CLI check command - report which tooling artifacts are in place.
 */

import { Command } from 'commander';
import { checkProject, hasFailures } from '../../core/check.js';
import { createSetupContext } from '../../core/context.js';
import { ExitCode } from '../../types/exit-codes.js';
import { colorsSupported } from '../renderers/colors.js';
import { renderCheckResults } from '../renderers/index.js';

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Check the project for the files and hooks setup would create (read-only)')
    .option('--cwd <dir>', 'Project directory (default: current directory)')
    .action(async (opts: { cwd?: string }) => {
      const ctx = createSetupContext({ root: opts.cwd });
      const results = await checkProject(ctx);
      process.stdout.write(`${renderCheckResults(results, { color: colorsSupported(process.stdout) })}\n`);
      if (hasFailures(results)) {
        process.exitCode = ExitCode.GENERAL_ERROR;
      }
    });
}
