/**
 * Tests for human-readable renderers.
 */

import { describe, it, expect } from 'vitest';
import { StackError } from '../../core/errors.js';
import { renderCheckResults, renderError, renderSetupSummary } from '../renderers/index.js';
import { createPalette } from '../renderers/colors.js';

describe('renderError', () => {
  it('prefixes the message and adds the fix hint', () => {
    const err = new StackError('TOOL_MISSING', 'Poetry not found.', {
      fix: 'Try installing with: `pipx install poetry`',
    });
    expect(renderError(err, { color: false })).toBe(
      '❌ Error: Poetry not found.\n  Fix: Try installing with: `pipx install poetry`',
    );
  });

  it('renders a multi-line command failure as is', () => {
    const err = new StackError('COMMAND_FAILED', 'Command `poetry init -n` failed with exit code 1.\nError:\nboom\n');
    expect(renderError(err, { color: false })).toBe(
      '❌ Error: Command `poetry init -n` failed with exit code 1.\nError:\nboom\n',
    );
  });
});

describe('renderCheckResults', () => {
  it('prints one line per check, fixes indented, then a tally', () => {
    const text = renderCheckResults([
      { id: 'package-manager', status: 'passed', message: 'Poetry found on PATH', fix: null },
      { id: 'security-policy', status: 'warning', message: 'SECURITY.md is missing', fix: 'Run: stacksmith setup' },
      { id: 'pyproject', status: 'failed', message: 'pyproject.toml is missing', fix: 'Run: stacksmith setup' },
    ], { color: false });

    expect(text).toBe([
      '✔ Poetry found on PATH',
      '⚠ SECURITY.md is missing',
      '  Run: stacksmith setup',
      '✖ pyproject.toml is missing',
      '  Run: stacksmith setup',
      '',
      '1 passed, 1 warning(s), 1 failed',
    ].join('\n'));
  });
});

describe('renderSetupSummary', () => {
  it('lists each artifact with its action', () => {
    expect(renderSetupSummary({
      dryRun: false,
      initialized: true,
      commands: [],
      artifacts: [
        { artifact: 'pyproject.toml', path: '/p/pyproject.toml', action: 'appended', sections: ['ruff'] },
        { artifact: 'SECURITY.md', path: '/p/SECURITY.md', action: 'replaced', backupPath: '/p/SECURITY.md.bak' },
      ],
    })).toBe('Artifacts:\n  pyproject.toml: appended\n  SECURITY.md: replaced (backup: /p/SECURITY.md.bak)');
  });
});

describe('createPalette', () => {
  it('wraps text in ANSI codes only when enabled', () => {
    expect(createPalette(false).red('x')).toBe('x');
    expect(createPalette(true).red('x')).toBe('\x1b[0;31mx\x1b[0m');
  });
});
