/**
 * Dependabot manifest under .github/.
 */

import { mkdir } from 'node:fs/promises';
import { StackError, errnoCode, errorMessage, fail, type StepResult } from '../errors.js';
import { loadTemplate } from '../templates.js';
import { safeWrite } from '../writer.js';
import type { ArtifactResult, GeneratorContext } from './types.js';

export async function generateDependabotConfig(ctx: GeneratorContext): Promise<StepResult<ArtifactResult>> {
  ctx.reporter.info('📝 Generating .github/dependabot.yml...');

  if (!ctx.options.dryRun) {
    try {
      await mkdir(ctx.paths.githubDir);
    } catch (err) {
      if (errnoCode(err) !== 'EEXIST') {
        return fail(new StackError(
          'WRITE_FAILED',
          `Could not create the .github directory: ${errorMessage(err)}`,
          { cause: err },
        ));
      }
    }
  }

  const written = await safeWrite(ctx.paths.dependabotConfig, loadTemplate('dependabot.yml'), ctx);
  if (!written.success) return written;
  return { success: true, data: { artifact: '.github/dependabot.yml', ...written.data } };
}
