/**
 * Tooling settings in pyproject.toml.
 *
 * Sections are detected by a literal substring search for their header and
 * appended only when absent; existing content is never rewritten.
 */

import { appendFile } from 'node:fs/promises';
import { StackError, errorMessage, fail, ok, type StepResult } from '../errors.js';
import { getLogger } from '../logger.js';
import { loadTemplate, type TemplateName } from '../templates.js';
import { readExisting } from '../writer.js';
import type { ArtifactResult, GeneratorContext } from './types.js';

export type ToolingSectionName = 'ruff' | 'mypy' | 'pytest';

export interface ToolingSection {
  name: ToolingSectionName;
  /** Header whose presence marks the section as configured. */
  header: string;
  template: TemplateName;
}

export const TOOLING_SECTIONS: readonly ToolingSection[] = [
  { name: 'ruff', header: '[tool.ruff]', template: 'pyproject/ruff.toml' },
  { name: 'mypy', header: '[tool.mypy]', template: 'pyproject/mypy.toml' },
  { name: 'pytest', header: '[tool.pytest.ini_options]', template: 'pyproject/pytest.toml' },
];

export interface ToolingPlan {
  missing: ToolingSectionName[];
  /** Text to append after the existing content; empty when nothing is missing. */
  addition: string;
}

/** Work out which sections are missing from existing pyproject.toml content. */
export function planToolingSections(existing: string): ToolingPlan {
  const missing: ToolingSectionName[] = [];
  let addition = '';
  for (const section of TOOLING_SECTIONS) {
    if (existing.includes(section.header)) continue;
    missing.push(section.name);
    addition += loadTemplate(section.template);
  }
  return { missing, addition };
}

export async function generatePyprojectConfig(ctx: GeneratorContext): Promise<StepResult<ArtifactResult>> {
  const { pyproject } = ctx.paths;
  ctx.reporter.info('📝 Generating Ruff, Mypy and Pytest settings in pyproject.toml...');

  // Before `poetry init` has run the file may not exist yet.
  const existing = await readExisting(pyproject);
  if (!existing.success) return existing;

  const plan = planToolingSections(existing.data ?? '');
  if (plan.missing.length === 0) {
    ctx.reporter.info('✅ Ruff, Mypy and Pytest settings already present in pyproject.toml.');
    return ok({ artifact: 'pyproject.toml', path: pyproject, action: 'unchanged', sections: [] });
  }

  if (ctx.options.dryRun) {
    ctx.reporter.detail(`Would add tooling settings to pyproject.toml (${plan.missing.join(', ')})`);
    return ok({ artifact: 'pyproject.toml', path: pyproject, action: 'simulated', sections: plan.missing });
  }

  try {
    await appendFile(pyproject, plan.addition, 'utf-8');
  } catch (err) {
    return fail(new StackError(
      'WRITE_FAILED',
      `Could not write pyproject.toml: ${errorMessage(err)}`,
      { cause: err },
    ));
  }
  getLogger('generators').debug({ path: pyproject, sections: plan.missing }, 'Appended tooling sections');
  ctx.reporter.detail(`Added sections to pyproject.toml: ${plan.missing.join(', ')}`);

  return ok({ artifact: 'pyproject.toml', path: pyproject, action: 'appended', sections: plan.missing });
}
