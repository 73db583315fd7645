/**
 * File writer with `.bak` backups.
 *
 * Writes are whole-file and atomic (temp file -> rename, via write-file-atomic).
 * An existing file is renamed to `<name>.bak` first unless force is set.
 * A file whose content already matches is left alone, so re-runs make no
 * backups and no writes.
 */

import writeFileAtomic from 'write-file-atomic';
import { readFile, rename } from 'node:fs/promises';
import { basename } from 'node:path';
import { StackError, errnoCode, errorMessage, fail, ok, type StepResult } from './errors.js';
import { getLogger } from './logger.js';
import { getBackupPath } from './paths.js';
import type { SetupContext } from './context.js';

export type WriteAction = 'created' | 'replaced' | 'unchanged' | 'simulated';

export interface WriteOutcome {
  action: WriteAction;
  path: string;
  /** Set when the previous content was moved aside. */
  backupPath?: string;
}

type WriterContext = Pick<SetupContext, 'options' | 'reporter'>;

/**
 * Read a file as UTF-8, returning null when it does not exist.
 * Any other read error is a WRITE_FAILED result.
 */
export async function readExisting(filePath: string): Promise<StepResult<string | null>> {
  try {
    return ok(await readFile(filePath, 'utf-8'));
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return ok(null);
    return fail(new StackError(
      'WRITE_FAILED',
      `Could not read ${basename(filePath)}: ${errorMessage(err)}`,
      { cause: err },
    ));
  }
}

/** Write content to a file, backing up any previous version. */
export async function safeWrite(
  filePath: string,
  content: string,
  ctx: WriterContext,
): Promise<StepResult<WriteOutcome>> {
  ctx.reporter.detail(`Writing file: ${filePath}`);
  if (ctx.options.dryRun) {
    return ok({ action: 'simulated', path: filePath });
  }

  const log = getLogger('writer');
  const existing = await readExisting(filePath);
  if (!existing.success) return existing;

  if (existing.data === content) {
    ctx.reporter.detail(`Already up to date: ${basename(filePath)}`);
    return ok({ action: 'unchanged', path: filePath });
  }

  let backupPath: string | undefined;
  if (existing.data !== null && !ctx.options.force) {
    const target = getBackupPath(filePath);
    try {
      await rename(filePath, target);
    } catch (err) {
      return fail(new StackError(
        'WRITE_FAILED',
        `Could not back up ${basename(filePath)}: ${errorMessage(err)}`,
        { cause: err },
      ));
    }
    backupPath = target;
    log.debug({ path: filePath, backupPath }, 'Backed up existing file');
    ctx.reporter.info(`⚠️  Backup created: ${basename(target)}`);
  }

  try {
    await writeFileAtomic(filePath, content, { encoding: 'utf8' });
  } catch (err) {
    return fail(new StackError(
      'WRITE_FAILED',
      `Could not write ${basename(filePath)}: ${errorMessage(err)}`,
      { cause: err },
    ));
  }
  log.debug({ path: filePath, bytes: Buffer.byteLength(content) }, 'Wrote file');

  return ok({
    action: existing.data === null ? 'created' : 'replaced',
    path: filePath,
    ...(backupPath && { backupPath }),
  });
}
