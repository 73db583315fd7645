import type { StepResult } from '../errors.js';
import { loadTemplate } from '../templates.js';
import { safeWrite } from '../writer.js';
import type { ArtifactResult, GeneratorContext } from './types.js';

/** Write .pre-commit-config.yaml (ruff, mypy, bandit, safety, semgrep and the stock hooks). */
export async function generatePreCommitConfig(ctx: GeneratorContext): Promise<StepResult<ArtifactResult>> {
  ctx.reporter.info('📝 Generating .pre-commit-config.yaml...');
  const written = await safeWrite(ctx.paths.preCommitConfig, loadTemplate('pre-commit-config.yaml'), ctx);
  if (!written.success) return written;
  return { success: true, data: { artifact: '.pre-commit-config.yaml', ...written.data } };
}
