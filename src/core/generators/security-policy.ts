import type { StepResult } from '../errors.js';
import { loadTemplate } from '../templates.js';
import { safeWrite } from '../writer.js';
import type { ArtifactResult, GeneratorContext } from './types.js';

/** Write SECURITY.md with a rolling-release support table and reporting instructions. */
export async function generateSecurityPolicy(ctx: GeneratorContext): Promise<StepResult<ArtifactResult>> {
  ctx.reporter.info('📝 Generating security policy in SECURITY.md...');
  const written = await safeWrite(ctx.paths.securityPolicy, loadTemplate('SECURITY.md'), ctx);
  if (!written.success) return written;
  return { success: true, data: { artifact: 'SECURITY.md', ...written.data } };
}
