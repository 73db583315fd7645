/**
 * Program factory: builds the commander program with every command registered.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { getPackageRoot } from '../core/templates.js';
import { registerCheckCommand } from './commands/check.js';
import { registerSetupCommand } from './commands/setup.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  try {
    const raw: unknown = JSON.parse(readFileSync(join(getPackageRoot(), 'package.json'), 'utf-8'));
    if (raw && typeof raw === 'object' && 'version' in raw && typeof raw.version === 'string') {
      return raw.version;
    }
  } catch {
    // unreadable package.json: fall through
  }
  return '0.0.0';
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('stacksmith')
    .description('Bootstrap a Poetry project with Ruff, Mypy, Pytest, pre-commit, Dependabot and a security policy')
    .version(getPackageVersion());

  registerSetupCommand(program);
  registerCheckCommand(program);

  return program;
}
