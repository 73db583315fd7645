/**
 * Read-only project check.
 *
 * Reports which parts of the tooling setup are in place. Never writes and
 * never spawns a process.
 */

import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { commandExists } from './platform.js';
import { TOOLING_SECTIONS } from './generators/pyproject.js';
import { loadTemplate, type TemplateName } from './templates.js';
import { readExisting } from './writer.js';
import type { SetupContext } from './context.js';

export type CheckStatus = 'passed' | 'warning' | 'failed';

export interface CheckResult {
  id: string;
  status: CheckStatus;
  message: string;
  fix: string | null;
}

const SETUP_FIX = 'Run: stacksmith setup';

async function checkArtifact(
  id: string,
  label: string,
  filePath: string,
  template: TemplateName,
): Promise<CheckResult> {
  const existing = await readExisting(filePath);
  if (!existing.success) {
    return { id, status: 'failed', message: existing.error.message, fix: null };
  }
  if (existing.data === null) {
    return { id, status: 'warning', message: `${label} is missing`, fix: SETUP_FIX };
  }
  if (existing.data !== loadTemplate(template)) {
    return {
      id,
      status: 'warning',
      message: `${label} differs from the generated template`,
      fix: 'Run: stacksmith setup (the current file is kept as a .bak backup)',
    };
  }
  return { id, status: 'passed', message: `${label} is up to date`, fix: null };
}

export async function checkProject(ctx: SetupContext): Promise<CheckResult[]> {
  const { command, displayName, installer } = ctx.config.packageManager;
  const results: CheckResult[] = [];

  const hasTool = commandExists(command, ctx.env, ctx.capabilities.platform, ctx.paths.root);
  results.push(hasTool
    ? { id: 'package-manager', status: 'passed', message: `${displayName} found on PATH`, fix: null }
    : {
      id: 'package-manager',
      status: 'failed',
      message: `${displayName} not found on PATH`,
      fix: `Install with: ${installer} install ${command}`,
    });

  const pyproject = await readExisting(ctx.paths.pyproject);
  if (!pyproject.success) {
    results.push({ id: 'pyproject', status: 'failed', message: pyproject.error.message, fix: null });
  } else if (pyproject.data === null) {
    results.push({ id: 'pyproject', status: 'failed', message: 'pyproject.toml is missing', fix: SETUP_FIX });
  } else {
    results.push({ id: 'pyproject', status: 'passed', message: 'pyproject.toml found', fix: null });
    for (const section of TOOLING_SECTIONS) {
      const present = pyproject.data.includes(section.header);
      results.push({
        id: `pyproject-${section.name}`,
        status: present ? 'passed' : 'warning',
        message: present ? `${section.header} present` : `${section.header} missing`,
        fix: present ? null : SETUP_FIX,
      });
    }
  }

  results.push(await checkArtifact(
    'pre-commit-config', '.pre-commit-config.yaml', ctx.paths.preCommitConfig, 'pre-commit-config.yaml',
  ));
  results.push(await checkArtifact(
    'dependabot', '.github/dependabot.yml', ctx.paths.dependabotConfig, 'dependabot.yml',
  ));
  results.push(await checkArtifact(
    'security-policy', 'SECURITY.md', ctx.paths.securityPolicy, 'SECURITY.md',
  ));

  const hookInstalled = existsSync(join(ctx.paths.gitHooksDir, 'pre-commit'));
  results.push(hookInstalled
    ? { id: 'git-hook', status: 'passed', message: 'pre-commit git hook installed', fix: null }
    : {
      id: 'git-hook',
      status: 'warning',
      message: 'pre-commit git hook not installed',
      fix: `Run: ${command} run pre-commit install`,
    });

  return results;
}

/** Whether any check failed outright. */
export function hasFailures(results: readonly CheckResult[]): boolean {
  return results.some((r) => r.status === 'failed');
}
