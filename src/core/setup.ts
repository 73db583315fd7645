/**
 * Setup orchestrator.
 *
 * A fixed linear sequence: verify the package manager, initialize the project,
 * add dependencies, generate configuration, install hooks. The first failure
 * stops the run and is returned to the caller; nothing is rolled back.
 */

import { existsSync } from 'node:fs';
import { StackError, fail, ok, type StepResult } from './errors.js';
import { getLogger } from './logger.js';
import { commandExists } from './platform.js';
import { directoryExists } from './paths.js';
import { getDevDependencies, getProductionDependencies } from './dependencies.js';
import { GENERATORS, type ArtifactResult } from './generators/index.js';
import { runCommand, type CommandLine } from './runner.js';
import type { SetupContext } from './context.js';

export interface SetupSummary {
  dryRun: boolean;
  /** Whether `init` ran (false when pyproject.toml already existed). */
  initialized: boolean;
  commands: string[];
  artifacts: ArtifactResult[];
}

/**
 * Verify the package manager is on PATH.
 * When missing, the fix hint suggests the simpler installer if it is present.
 */
export function checkPackageManager(ctx: SetupContext): StepResult<string> {
  const { command, displayName, installer, docsUrl } = ctx.config.packageManager;
  ctx.reporter.info(`🔎 Checking that ${displayName} is installed...`);

  if (commandExists(command, ctx.env, ctx.capabilities.platform, ctx.paths.root)) {
    ctx.reporter.info(`✅ ${displayName} found.`);
    return ok(command);
  }

  const fix = commandExists(installer, ctx.env, ctx.capabilities.platform, ctx.paths.root)
    ? `Try installing with: \`${installer} install ${command}\``
    : `See the official documentation: ${docsUrl}`;
  return fail(new StackError('TOOL_MISSING', `${displayName} not found.`, { fix }));
}

/** Print the closing hints. */
export function printGuidance(ctx: SetupContext): void {
  const { command } = ctx.config.packageManager;
  ctx.reporter.info('\n✅ Environment configured successfully!');
  ctx.reporter.info(`Run \`${command} shell\` to activate the virtual environment.`);
  ctx.reporter.info(`💡 Tip: run \`${command} config virtualenvs.in-project true\` to keep the .venv inside the project.`);
  ctx.reporter.info(`\n🔒 Remember to commit \`${command}.lock\` to keep builds reproducible.`);
}

/** Run the full setup sequence. */
export async function runSetup(ctx: SetupContext): Promise<StepResult<SetupSummary>> {
  const log = getLogger('setup');
  const { command, displayName } = ctx.config.packageManager;
  const summary: SetupSummary = {
    dryRun: ctx.options.dryRun,
    initialized: false,
    commands: [],
    artifacts: [],
  };

  const run = async (commandLine: CommandLine): Promise<StepResult<void>> => {
    summary.commands.push(commandLine.join(' '));
    const result = await runCommand(commandLine, ctx);
    return result.success ? ok(undefined) : result;
  };

  if (!directoryExists(ctx.paths.root)) {
    return fail(new StackError(
      'WRITE_FAILED',
      `Project directory ${ctx.paths.root} does not exist.`,
      { fix: 'Create it first, or pass an existing directory with --cwd.' },
    ));
  }

  const tool = checkPackageManager(ctx);
  if (!tool.success) return tool;

  ctx.reporter.info('\n🚀 Starting Python environment setup...');
  log.debug({ root: ctx.paths.root, options: ctx.options, capabilities: ctx.capabilities }, 'Setup started');

  if (existsSync(ctx.paths.pyproject)) {
    ctx.reporter.info(`✅ ${displayName} project already initialized.`);
  } else {
    ctx.reporter.info(`🛠️  Initializing ${displayName} project...`);
    const init = await run([command, 'init', '-n']);
    if (!init.success) return init;
    summary.initialized = true;
  }

  ctx.reporter.info('📦 Adding production dependencies...');
  const prod = await run([command, 'add', ...getProductionDependencies(ctx.capabilities)]);
  if (!prod.success) return prod;

  ctx.reporter.info('🔧 Adding development dependencies...');
  const dev = await run([command, 'add', '--group', 'dev', ...getDevDependencies()]);
  if (!dev.success) return dev;

  for (const generate of GENERATORS) {
    const result = await generate(ctx);
    if (!result.success) return result;
    summary.artifacts.push(result.data);
  }

  ctx.reporter.info('⚙️  Installing pre-commit hooks...');
  const hooks = await run([command, 'run', 'pre-commit', 'install']);
  if (!hooks.success) return hooks;

  printGuidance(ctx);
  log.debug({ commands: summary.commands.length, artifacts: summary.artifacts.length }, 'Setup finished');
  return ok(summary);
}
