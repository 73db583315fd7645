/**
 * Tests for the pyproject.toml tooling sections.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile, rm, writeFile } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { generatePyprojectConfig, planToolingSections } from '../generators/pyproject.js';
import { loadTemplate } from '../templates.js';
import { captureContext, createTempWorkspace, type TempWorkspace } from './helpers.js';

const ALL_SECTIONS = '[tool.ruff]\nline-length = 100\n\n[tool.mypy]\n\n[tool.pytest.ini_options]\n';
const POETRY_HEADER = '[tool.poetry]\nname = "demo"\nversion = "0.1.0"\n';

describe('planToolingSections', () => {
  it('finds nothing missing when every header is present', () => {
    expect(planToolingSections(ALL_SECTIONS)).toEqual({ missing: [], addition: '' });
  });

  it('returns only the missing section text', () => {
    const existing = '[tool.ruff]\n[tool.pytest.ini_options]\n';
    expect(planToolingSections(existing)).toEqual({
      missing: ['mypy'],
      addition: loadTemplate('pyproject/mypy.toml'),
    });
  });

  it('returns all sections in ruff, mypy, pytest order for empty content', () => {
    const plan = planToolingSections('');
    expect(plan.missing).toEqual(['ruff', 'mypy', 'pytest']);
    expect(plan.addition).toBe(
      loadTemplate('pyproject/ruff.toml')
      + loadTemplate('pyproject/mypy.toml')
      + loadTemplate('pyproject/pytest.toml'),
    );
  });

  it('matches headers by literal substring anywhere in the file', () => {
    const plan = planToolingSections('# see [tool.ruff] and [tool.mypy] and [tool.pytest.ini_options]\n');
    expect(plan.missing).toEqual([]);
  });
});

describe('section templates', () => {
  it('start with a blank line so they follow existing content', () => {
    expect(loadTemplate('pyproject/ruff.toml').startsWith('\n# --- Code quality ---\n[tool.ruff]\n')).toBe(true);
    expect(loadTemplate('pyproject/mypy.toml').startsWith('\n[tool.mypy]\n')).toBe(true);
    expect(loadTemplate('pyproject/pytest.toml')).toBe(
      '\n[tool.pytest.ini_options]\ntestpaths = ["tests"]\naddopts = "-v --cov=."\n',
    );
  });
});

describe('generatePyprojectConfig', () => {
  let ws: TempWorkspace;
  let pyproject: string;

  beforeEach(async () => {
    ws = await createTempWorkspace('stacksmith-pyproject-test-');
    pyproject = join(ws.projectDir, 'pyproject.toml');
  });

  afterEach(async () => {
    await rm(ws.dir, { recursive: true, force: true });
  });

  it('writes nothing and reports already present when all sections exist', async () => {
    await writeFile(pyproject, ALL_SECTIONS);
    const { ctx, lines } = captureContext(ws.projectDir, ws.binDir);

    const result = await generatePyprojectConfig(ctx);

    expect(result).toEqual({
      success: true,
      data: { artifact: 'pyproject.toml', path: pyproject, action: 'unchanged', sections: [] },
    });
    expect(await readFile(pyproject, 'utf-8')).toBe(ALL_SECTIONS);
    expect(lines).toEqual([
      '📝 Generating Ruff, Mypy and Pytest settings in pyproject.toml...',
      '✅ Ruff, Mypy and Pytest settings already present in pyproject.toml.',
    ]);
  });

  it('appends exactly the one missing section after existing content', async () => {
    const existing = `${POETRY_HEADER}\n[tool.ruff]\n\n[tool.pytest.ini_options]\n`;
    await writeFile(pyproject, existing);
    const { ctx } = captureContext(ws.projectDir, ws.binDir);

    const result = await generatePyprojectConfig(ctx);

    expect(result.success && result.data.sections).toEqual(['mypy']);
    expect(await readFile(pyproject, 'utf-8')).toBe(existing + loadTemplate('pyproject/mypy.toml'));
    expect(existsSync(`${pyproject}.bak`)).toBe(false);
  });

  it('creates the file with every section when it does not exist', async () => {
    const { ctx } = captureContext(ws.projectDir, ws.binDir);

    const result = await generatePyprojectConfig(ctx);

    expect(result.success && result.data.action).toBe('appended');
    expect(await readFile(pyproject, 'utf-8')).toBe(planToolingSections('').addition);
  });

  it('does not give the file a second copy on a repeat run', async () => {
    await writeFile(pyproject, POETRY_HEADER);
    const { ctx } = captureContext(ws.projectDir, ws.binDir);

    await generatePyprojectConfig(ctx);
    const afterFirst = await readFile(pyproject, 'utf-8');
    const second = await generatePyprojectConfig(ctx);

    expect(second.success && second.data.action).toBe('unchanged');
    expect(await readFile(pyproject, 'utf-8')).toBe(afterFirst);
    expect(afterFirst.split('[tool.mypy]')).toHaveLength(2);
  });

  it('only reports intent in dry-run mode', async () => {
    await writeFile(pyproject, POETRY_HEADER);
    const { ctx, lines } = captureContext(ws.projectDir, ws.binDir, {
      options: { dryRun: true, verbose: true },
    });

    const result = await generatePyprojectConfig(ctx);

    expect(result.success && result.data.action).toBe('simulated');
    expect(await readFile(pyproject, 'utf-8')).toBe(POETRY_HEADER);
    expect(lines).toEqual([
      '[DRY-RUN] 📝 Generating Ruff, Mypy and Pytest settings in pyproject.toml...',
      '[DRY-RUN] Would add tooling settings to pyproject.toml (ruff, mypy, pytest)',
    ]);
  });
});
