/**
 * Access to the template files shipped in the package's templates/ directory.
 * Template text is used verbatim; nothing here parses it.
 */

import { readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

export type TemplateName =
  | 'pre-commit-config.yaml'
  | 'dependabot.yml'
  | 'SECURITY.md'
  | 'pyproject/ruff.toml'
  | 'pyproject/mypy.toml'
  | 'pyproject/pytest.toml';

const cache = new Map<TemplateName, string>();

/**
 * Resolve the package root directory (where templates/ lives).
 * templates.ts lives in src/core/ (or dist/core/), so 2 levels up.
 */
export function getPackageRoot(): string {
  const thisFile = fileURLToPath(import.meta.url);
  return resolve(dirname(thisFile), '..', '..');
}

export function getTemplatePath(name: TemplateName): string {
  return join(getPackageRoot(), 'templates', name);
}

/** Load a template's text. Throws if the package is missing the file. */
export function loadTemplate(name: TemplateName): string {
  const cached = cache.get(name);
  if (cached !== undefined) return cached;
  const content = readFileSync(getTemplatePath(name), 'utf-8');
  cache.set(name, content);
  return content;
}
