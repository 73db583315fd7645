/**
 * Progress output for setup steps.
 *
 * info() lines always print; detail() lines print only in verbose mode.
 * In dry-run mode every line carries a `[DRY-RUN] ` prefix.
 */

import type { RunOptions } from '../types/config.js';

export const DRY_RUN_PREFIX = '[DRY-RUN] ';

export interface Reporter {
  /** Step-level progress, always shown. */
  info(message: string): void;
  /** Detailed logs, shown only with --verbose. */
  detail(message: string): void;
}

export type LineWriter = (line: string) => void;

const stdoutWriter: LineWriter = (line) => {
  process.stdout.write(`${line}\n`);
};

/**
 * Prefix a message for dry-run mode.
 * Leading blank lines stay ahead of the prefix so spacing is preserved.
 */
export function prefixLine(message: string, dryRun: boolean): string {
  if (!dryRun) return message;
  const leading = /^\n*/.exec(message)?.[0] ?? '';
  return `${leading}${DRY_RUN_PREFIX}${message.slice(leading.length)}`;
}

export function createReporter(
  options: Pick<RunOptions, 'dryRun' | 'verbose'>,
  write: LineWriter = stdoutWriter,
): Reporter {
  return {
    info(message) {
      write(prefixLine(message, options.dryRun));
    },
    detail(message) {
      if (!options.verbose) return;
      write(prefixLine(message, options.dryRun));
    },
  };
}
