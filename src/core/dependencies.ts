/**
 * Dependency sets added to the bootstrapped project.
 */

import type { PlatformCapabilities } from '../types/config.js';

export const PRODUCTION_DEPENDENCIES = ['pydantic>=2.0', 'orjson'] as const;

/** Optional event loop; skipped where the host has no build of it. */
export const ASYNC_EVENT_LOOP_DEPENDENCY = 'uvloop';

export const DEV_DEPENDENCIES = [
  'ruff',
  'mypy',
  'bandit',
  'safety',
  'pre-commit',
  'pytest',
  'pytest-cov',
  'py-spy',
  'semgrep',
] as const;

export function getProductionDependencies(capabilities: Pick<PlatformCapabilities, 'asyncEventLoop'>): string[] {
  const deps: string[] = [...PRODUCTION_DEPENDENCIES];
  if (capabilities.asyncEventLoop) {
    deps.push(ASYNC_EVENT_LOOP_DEPENDENCY);
  }
  return deps;
}

export function getDevDependencies(): string[] {
  return [...DEV_DEPENDENCIES];
}
