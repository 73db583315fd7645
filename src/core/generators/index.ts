/**
 * Config generators, in the order setup runs them.
 */

import { generateDependabotConfig } from './dependabot.js';
import { generatePreCommitConfig } from './pre-commit.js';
import { generatePyprojectConfig } from './pyproject.js';
import { generateSecurityPolicy } from './security-policy.js';
import type { Generator } from './types.js';

export const GENERATORS: readonly Generator[] = [
  generatePyprojectConfig,
  generatePreCommitConfig,
  generateDependabotConfig,
  generateSecurityPolicy,
];

export { generateDependabotConfig, generatePreCommitConfig, generatePyprojectConfig, generateSecurityPolicy };
export { planToolingSections, TOOLING_SECTIONS } from './pyproject.js';
export type { ToolingPlan, ToolingSection, ToolingSectionName } from './pyproject.js';
export type { ArtifactAction, ArtifactResult, Generator, GeneratorContext } from './types.js';
