/**
 * Shared fixtures for core tests: temp projects, fake executables on PATH,
 * and stand-ins for spawned child processes.
 */

import type { ChildProcess } from 'node:child_process';
import { EventEmitter } from 'node:events';
import { chmod, mkdir, mkdtemp, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { PassThrough } from 'node:stream';
import { createSetupContext, type CreateContextOptions, type SetupContext } from '../context.js';

export interface FakeChildBehaviour {
  code?: number | null;
  signal?: NodeJS.Signals | null;
  stdout?: string;
  stderr?: string;
  error?: Error;
}

/** A child process that emits the given output and exit status on the next ticks. */
export function fakeChild(behaviour: FakeChildBehaviour = {}): ChildProcess {
  const child = Object.assign(new EventEmitter(), {
    pid: 4242,
    stdout: new PassThrough(),
    stderr: new PassThrough(),
  });

  setImmediate(() => {
    if (behaviour.error) {
      child.emit('error', behaviour.error);
      return;
    }
    if (behaviour.stdout) child.stdout.write(behaviour.stdout);
    if (behaviour.stderr) child.stderr.write(behaviour.stderr);
    child.stdout.end();
    child.stderr.end();
    setImmediate(() => {
      child.emit('close', behaviour.code === undefined ? 0 : behaviour.code, behaviour.signal ?? null);
    });
  });

  return child as unknown as ChildProcess;
}

export function enoent(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
}

export interface TempWorkspace {
  dir: string;
  projectDir: string;
  binDir: string;
}

export async function createTempWorkspace(prefix: string): Promise<TempWorkspace> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  const projectDir = join(dir, 'project');
  const binDir = join(dir, 'bin');
  await mkdir(projectDir, { recursive: true });
  await mkdir(binDir, { recursive: true });
  return { dir, projectDir, binDir };
}

/** Put an executable stub named `name` in binDir. */
export async function installFakeTool(binDir: string, name: string): Promise<string> {
  const toolPath = join(binDir, name);
  await writeFile(toolPath, '#!/bin/sh\nexit 0\n');
  await chmod(toolPath, 0o755);
  return toolPath;
}

export interface CapturedContext {
  ctx: SetupContext;
  lines: string[];
}

/** Build a context whose progress lines are collected instead of printed. */
export function captureContext(
  projectDir: string,
  binDir: string,
  overrides: Omit<CreateContextOptions, 'root' | 'write'> = {},
): CapturedContext {
  const lines: string[] = [];
  const ctx = createSetupContext({
    platform: 'linux',
    env: { PATH: binDir },
    ...overrides,
    root: projectDir,
    write: (line) => {
      lines.push(line);
    },
  });
  return { ctx, lines };
}
