/**
 * Command runner for external tools.
 *
 * Spawns the executable directly (no shell) in the project root and waits for
 * it to exit. Streaming mode inherits stdin/stdout and tees stderr to the
 * terminal while keeping a copy for the error message; capture mode pipes
 * both streams and returns them.
 */

import { spawn } from 'node:child_process';
import { StackError, errnoCode, errorMessage, fail, ok, type StepResult } from './errors.js';
import { getLogger } from './logger.js';
import { directoryExists } from './paths.js';
import type { SetupContext } from './context.js';

/** An executable followed by its arguments. */
export type CommandLine = readonly [string, ...string[]];

export interface RunCommandOptions {
  /** Capture stdout/stderr instead of streaming them to the terminal. */
  capture?: boolean;
}

export interface CommandOutput {
  exitCode: number;
  stdout: string;
  stderr: string;
}

type RunnerContext = Pick<SetupContext, 'options' | 'paths' | 'reporter' | 'env'>;

export function formatCommandLine(commandLine: CommandLine): string {
  return commandLine.join(' ');
}

/**
 * Run an external command to completion.
 *
 * Dry run returns a synthetic success without spawning. A missing executable
 * fails with TOOL_MISSING; a nonzero exit or a signal fails with COMMAND_FAILED.
 */
export function runCommand(
  commandLine: CommandLine,
  ctx: RunnerContext,
  opts: RunCommandOptions = {},
): Promise<StepResult<CommandOutput>> {
  const display = formatCommandLine(commandLine);
  ctx.reporter.detail(`Running command: \`${display}\``);

  if (ctx.options.dryRun) {
    return Promise.resolve(ok({ exitCode: 0, stdout: '', stderr: '' }));
  }

  const log = getLogger('runner');
  const capture = opts.capture ?? false;
  const [command, ...args] = commandLine;
  const startedAt = Date.now();

  return new Promise((resolve) => {
    let stdout = '';
    let stderr = '';

    const child = spawn(command, args, {
      cwd: ctx.paths.root,
      env: ctx.env,
      stdio: capture ? ['ignore', 'pipe', 'pipe'] : ['inherit', 'inherit', 'pipe'],
    });
    log.debug({ command: display, pid: child.pid, capture }, 'Spawned command');

    child.stdout?.setEncoding('utf8');
    child.stdout?.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr?.setEncoding('utf8');
    child.stderr?.on('data', (chunk: string) => {
      stderr += chunk;
      if (!capture) process.stderr.write(chunk);
    });

    child.on('error', (err) => {
      // spawn reports a missing working directory as ENOENT too.
      if (errnoCode(err) === 'ENOENT' && !directoryExists(ctx.paths.root)) {
        resolve(fail(new StackError(
          'COMMAND_FAILED',
          `Command \`${display}\` could not be started: project directory ${ctx.paths.root} does not exist.`,
          { cause: err },
        )));
        return;
      }
      if (errnoCode(err) === 'ENOENT') {
        log.debug({ command }, 'Executable not found');
        resolve(fail(new StackError(
          'TOOL_MISSING',
          `Command '${command}' not found. Check that it is installed and on your PATH.`,
          { cause: err },
        )));
        return;
      }
      resolve(fail(new StackError(
        'COMMAND_FAILED',
        `Command \`${display}\` could not be started: ${errorMessage(err)}`,
        { cause: err },
      )));
    });

    child.on('close', (code, signal) => {
      const durationMs = Date.now() - startedAt;
      log.debug({ command: display, exitCode: code, signal, durationMs }, 'Command finished');

      if (code === 0) {
        resolve(ok({ exitCode: 0, stdout, stderr }));
        return;
      }

      const exitCode = code ?? 1;
      let message = code === null
        ? `Command \`${display}\` was terminated by signal ${signal ?? 'unknown'}.`
        : `Command \`${display}\` failed with exit code ${code}.`;
      if (stderr && !capture) {
        message += `\nError:\n${stderr}`;
      }
      resolve(fail(new StackError('COMMAND_FAILED', message, { commandExitCode: exitCode })));
    });
  });
}
