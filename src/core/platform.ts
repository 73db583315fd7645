/**
 * Platform compatibility layer.
 *
 * Detects the runtime platform, resolves host capabilities once, and looks
 * up executables on PATH without spawning anything.
 */

import { accessSync, constants as fsConstants, statSync } from 'node:fs';
import { delimiter, extname, join, resolve } from 'node:path';
import type { Platform, PlatformCapabilities } from '../types/config.js';

/** Map a Node.js platform identifier to a Platform. */
export function detectPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  switch (nodePlatform) {
    case 'linux': return 'linux';
    case 'darwin': return 'macos';
    case 'win32': return 'windows';
    default: return 'unknown';
  }
}

/**
 * Resolve host capabilities.
 * uvloop has no Windows build, so the async event loop is off there.
 */
export function resolveCapabilities(platform: Platform = detectPlatform()): PlatformCapabilities {
  return {
    platform,
    asyncEventLoop: platform !== 'windows',
  };
}

function isExecutableFile(candidate: string, platform: Platform): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    // Windows has no execute bit; the PATHEXT extension decides.
    if (platform !== 'windows') accessSync(candidate, fsConstants.X_OK);
    return true;
  } catch {
    return false;
  }
}

const DEFAULT_PATHEXT = '.COM;.EXE;.BAT;.CMD';

/**
 * Extensions to try after the command name. On Windows only PATHEXT
 * extensions count, unless the name already carries one.
 */
function candidateExtensions(command: string, env: NodeJS.ProcessEnv, platform: Platform): string[] {
  if (platform !== 'windows') return [''];
  const pathext = (env['PATHEXT'] ?? DEFAULT_PATHEXT).split(';').filter(Boolean);
  const ext = extname(command).toUpperCase();
  if (ext && pathext.some((known) => known.toUpperCase() === ext)) return [''];
  return pathext;
}

function hasPathSeparator(command: string, platform: Platform): boolean {
  return command.includes('/') || (platform === 'windows' && command.includes('\\'));
}

/**
 * Find an executable the way a shell would.
 *
 * A command containing a path separator is resolved against `cwd` and
 * checked directly; any other name is looked up in each PATH directory.
 * Returns the absolute path of the first match, or null.
 */
export function findExecutable(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: Platform = detectPlatform(),
  cwd: string = process.cwd(),
): string | null {
  const extensions = candidateExtensions(command, env, platform);

  if (hasPathSeparator(command, platform)) {
    for (const ext of extensions) {
      const candidate = resolve(cwd, command + ext);
      if (isExecutableFile(candidate, platform)) return candidate;
    }
    return null;
  }

  const pathValue = env['PATH'] ?? env['Path'] ?? '';
  const dirs = pathValue.split(delimiter).filter(Boolean);
  for (const dir of dirs) {
    for (const ext of extensions) {
      const candidate = join(dir, command + ext);
      if (isExecutableFile(candidate, platform)) {
        return candidate;
      }
    }
  }
  return null;
}

/** Check if a command exists on PATH, or at the given path. */
export function commandExists(
  command: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: Platform = detectPlatform(),
  cwd: string = process.cwd(),
): boolean {
  return findExecutable(command, env, platform, cwd) !== null;
}
