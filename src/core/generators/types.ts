import type { StepResult } from '../errors.js';
import type { SetupContext } from '../context.js';
import type { WriteAction } from '../writer.js';

export type ArtifactAction = WriteAction | 'appended';

/** What a generator did to its target file. */
export interface ArtifactResult {
  artifact: string;
  path: string;
  action: ArtifactAction;
  backupPath?: string;
  /** Sections appended to pyproject.toml. */
  sections?: string[];
}

export type GeneratorContext = Pick<SetupContext, 'options' | 'paths' | 'reporter'>;

export type Generator = (ctx: GeneratorContext) => Promise<StepResult<ArtifactResult>>;
