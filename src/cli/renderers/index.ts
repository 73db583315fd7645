/**
 * Human-readable renderers for CLI output.
 */

import type { CheckResult, CheckStatus } from '../../core/check.js';
import type { StackError } from '../../core/errors.js';
import type { SetupSummary } from '../../core/setup.js';
import { createPalette, type Palette } from './colors.js';

export interface RenderOptions {
  color: boolean;
}

const STATUS_SYMBOLS: Record<CheckStatus, string> = {
  passed: '✔',
  warning: '⚠',
  failed: '✖',
};

function statusColor(status: CheckStatus, palette: Palette): (text: string) => string {
  switch (status) {
    case 'passed': return palette.green;
    case 'warning': return palette.yellow;
    case 'failed': return palette.red;
  }
}

/** Render a fatal error for stderr. */
export function renderError(error: StackError, opts: RenderOptions): string {
  const palette = createPalette(opts.color);
  let text = `${palette.red('❌ Error:')} ${error.message}`;
  if (error.fix) {
    text += `\n  Fix: ${error.fix}`;
  }
  return text;
}

/** Render project check results, one line per check plus a tally. */
export function renderCheckResults(results: readonly CheckResult[], opts: RenderOptions): string {
  const palette = createPalette(opts.color);
  const lines: string[] = [];
  const counts: Record<CheckStatus, number> = { passed: 0, warning: 0, failed: 0 };

  for (const result of results) {
    counts[result.status]++;
    const symbol = statusColor(result.status, palette)(STATUS_SYMBOLS[result.status]);
    lines.push(`${symbol} ${result.message}`);
    if (result.fix) {
      lines.push(`  ${palette.dim(result.fix)}`);
    }
  }

  lines.push('');
  lines.push(palette.bold(`${counts.passed} passed, ${counts.warning} warning(s), ${counts.failed} failed`));
  return lines.join('\n');
}

/** One-line-per-artifact recap shown after a verbose setup run. */
export function renderSetupSummary(summary: SetupSummary): string {
  const lines = summary.artifacts.map((a) => {
    const suffix = a.backupPath ? ` (backup: ${a.backupPath})` : '';
    return `  ${a.artifact}: ${a.action}${suffix}`;
  });
  return ['Artifacts:', ...lines].join('\n');
}
