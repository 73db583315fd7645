/**
 * Path resolution for the project being bootstrapped.
 *
 * All paths are resolved once from the project root and passed explicitly
 * to every component.
 */

import { statSync } from 'node:fs';
import { join, resolve } from 'node:path';
import type { ProjectPaths } from '../types/config.js';

export const PYPROJECT_FILE = 'pyproject.toml';
export const PRE_COMMIT_CONFIG_FILE = '.pre-commit-config.yaml';
export const GITHUB_DIR = '.github';
export const DEPENDABOT_CONFIG_FILE = 'dependabot.yml';
export const SECURITY_POLICY_FILE = 'SECURITY.md';

/** Suffix appended to a file name when it is backed up before a rewrite. */
export const BACKUP_SUFFIX = '.bak';

/**
 * Resolve every artifact path under a project root.
 * Relative roots resolve against the current working directory.
 */
export function resolveProjectPaths(root: string = process.cwd()): ProjectPaths {
  const absRoot = resolve(root);
  const githubDir = join(absRoot, GITHUB_DIR);
  return {
    root: absRoot,
    pyproject: join(absRoot, PYPROJECT_FILE),
    preCommitConfig: join(absRoot, PRE_COMMIT_CONFIG_FILE),
    githubDir,
    dependabotConfig: join(githubDir, DEPENDABOT_CONFIG_FILE),
    securityPolicy: join(absRoot, SECURITY_POLICY_FILE),
    gitHooksDir: join(absRoot, '.git', 'hooks'),
  };
}

/** Sibling path a file is renamed to before being overwritten. */
export function getBackupPath(filePath: string): string {
  return `${filePath}${BACKUP_SUFFIX}`;
}

export function directoryExists(dirPath: string): boolean {
  return statSync(dirPath, { throwIfNoEntry: false })?.isDirectory() ?? false;
}
