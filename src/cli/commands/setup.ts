/**
 * CLI setup command - bootstrap the project's tooling.
 *
 * Thin handler: parse args -> build context -> call core -> render.
 * All business logic lives in src/core/setup.ts.
 */

import { Command } from 'commander';
import { createSetupContext } from '../../core/context.js';
import { runSetup } from '../../core/setup.js';
import { colorsSupported } from '../renderers/colors.js';
import { renderError, renderSetupSummary } from '../renderers/index.js';

interface SetupCommandOptions {
  dryRun?: boolean;
  verbose?: boolean;
  force?: boolean;
  cwd?: string;
}

/**
 * Register the setup command. It is the default when no command is given.
 */
export function registerSetupCommand(program: Command): void {
  program
    .command('setup', { isDefault: true })
    .description('Initialize the Poetry project, add dependencies, write tooling config and install hooks')
    .option('--dry-run', 'Simulate the run without writing files or running commands')
    .option('--verbose', 'Print detailed logs for every step')
    .option('--force', 'Overwrite configuration files without creating .bak backups')
    .option('--cwd <dir>', 'Project directory (default: current directory)')
    .action(async (opts: SetupCommandOptions) => {
      const ctx = createSetupContext({
        options: {
          dryRun: !!opts.dryRun,
          verbose: !!opts.verbose,
          force: !!opts.force,
        },
        root: opts.cwd,
      });

      const result = await runSetup(ctx);
      if (!result.success) {
        process.stderr.write(`${renderError(result.error, { color: colorsSupported(process.stderr) })}\n`);
        process.exitCode = result.error.exitCode;
        return;
      }

      ctx.reporter.detail(renderSetupSummary(result.data));
    });
}
