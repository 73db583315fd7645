/**
 * Run context threaded through every setup component.
 */

import type { Platform, PlatformCapabilities, ProjectPaths, RunOptions, StackConfig } from '../types/config.js';
import { loadConfig } from './config.js';
import { createReporter, type LineWriter, type Reporter } from './output.js';
import { resolveProjectPaths } from './paths.js';
import { detectPlatform, resolveCapabilities } from './platform.js';

export interface SetupContext {
  readonly options: Readonly<RunOptions>;
  readonly paths: Readonly<ProjectPaths>;
  readonly capabilities: Readonly<PlatformCapabilities>;
  readonly config: Readonly<StackConfig>;
  readonly reporter: Reporter;
  /** Environment used for PATH lookups and passed to spawned processes. */
  readonly env: NodeJS.ProcessEnv;
}

export interface CreateContextOptions {
  options?: Partial<RunOptions>;
  root?: string;
  env?: NodeJS.ProcessEnv;
  platform?: Platform;
  write?: LineWriter;
}

/** Build an immutable run context from CLI input and the host environment. */
export function createSetupContext(input: CreateContextOptions = {}): SetupContext {
  const options: RunOptions = {
    dryRun: input.options?.dryRun ?? false,
    verbose: input.options?.verbose ?? false,
    force: input.options?.force ?? false,
  };
  const env = input.env ?? process.env;
  const platform = input.platform ?? detectPlatform();

  return Object.freeze({
    options: Object.freeze(options),
    paths: Object.freeze(resolveProjectPaths(input.root)),
    capabilities: Object.freeze(resolveCapabilities(platform)),
    config: loadConfig(env),
    reporter: createReporter(options, input.write),
    env,
  });
}
