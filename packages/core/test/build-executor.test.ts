import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { createTempTestDir, removeTempTestDir } from '@wheelhouse/utils';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { executeBuild, ExternalBuildTool, resolveInterpreter } from '../src/build-executor.js';
import { MemoryWorkspaceEffects } from '../src/memory-effects.js';
import type { BuildTool, SubProject } from '../src/types.js';

/**
 * Stand-in build frontend: `node fake-build.cjs <outdir> <mode>`
 */
const FAKE_BUILD_SCRIPT = `
const fs = require('node:fs');
const path = require('node:path');
const [outdir, mode] = process.argv.slice(2);
if (mode === 'stderr') {
  process.stderr.write('ERROR: missing dependency X\\n');
  process.exit(1);
}
if (mode === 'stdout') {
  process.stdout.write('build log only\\n');
  process.exit(1);
}
if (mode === 'silent') {
  process.exit(4);
}
if (mode === 'flood') {
  process.stderr.write('real stderr');
  setTimeout(() => process.stdout.write('x'.repeat(65536)), 200);
  return;
}
if (mode === 'env') {
  process.stderr.write(String(process.env.WH_TEST_MARK));
  process.exit(1);
}
fs.writeFileSync(path.join(outdir, path.basename(process.cwd()) + '-0.1.0-py3-none-any.whl'), 'wheel');
`;

describe('ExternalBuildTool', () => {
  let root: string;
  let script: string;
  let output: string;
  let core: SubProject;

  beforeEach(async () => {
    root = await createTempTestDir('wheelhouse-executor');
    script = join(root, 'fake-build.cjs');
    output = join(root, 'dist');
    writeFileSync(script, FAKE_BUILD_SCRIPT);
    mkdirSync(output);
    mkdirSync(join(root, 'core'));
    core = { name: 'core', path: join(root, 'core'), hasDescriptor: true, outcome: 'unbuilt' };
  });

  afterEach(async () => {
    await removeTempTestDir(root);
  });

  function tool(mode: string, env?: Record<string, string>, maxBuffer?: number): ExternalBuildTool {
    return new ExternalBuildTool({ interpreter: process.execPath, args: [script, '{outdir}', mode], env, maxBuffer });
  }

  it('should describe the full command line', () => {
    const external = new ExternalBuildTool({
      interpreter: 'python3',
      args: ['-m', 'build', '--wheel', '--outdir', '{outdir}'],
    });

    expect(external.description).toBe('python3 -m build --wheel --outdir {outdir}');
    expect(external.argsFor('/ws/dist/python')).toEqual(['-m', 'build', '--wheel', '--outdir', '/ws/dist/python']);
  });

  it('should run in the sub-project directory and write into the output directory', () => {
    const result = tool('ok').run({ project: core, outputDir: output });

    expect(result).toEqual({ ok: true, diagnostic: '' });
    expect(existsSync(join(output, 'core-0.1.0-py3-none-any.whl'))).toBe(true);
  });

  it('should use stderr as the diagnostic of a failing build', () => {
    const result = tool('stderr').run({ project: core, outputDir: output });

    expect(result).toEqual({ ok: false, diagnostic: 'ERROR: missing dependency X' });
  });

  it('should fall back to stdout when stderr is empty', () => {
    const result = tool('stdout').run({ project: core, outputDir: output });

    expect(result).toEqual({ ok: false, diagnostic: 'build log only' });
  });

  it('should report the exit code when the build prints nothing', () => {
    const result = tool('silent').run({ project: core, outputDir: output });

    expect(result).toEqual({ ok: false, diagnostic: 'Build tool exited with code 4' });
  });

  it('should pass extra environment variables', () => {
    const result = tool('env', { WH_TEST_MARK: 'marked' }).run({ project: core, outputDir: output });

    expect(result).toEqual({ ok: false, diagnostic: 'marked' });
  });

  it('should keep stderr of a build stopped for exceeding the output limit', () => {
    const result = tool('flood', undefined, 1024).run({ project: core, outputDir: output });

    expect(result.ok).toBe(false);
    expect(result.diagnostic).toMatch(/^real stderr\nBuild tool stopped: spawnSync .+ ENOBUFS$/);
  });

  it('should report a missing interpreter as a failed build', () => {
    const missing = new ExternalBuildTool({ interpreter: 'wheelhouse-no-such-python', args: [] });

    const result = missing.run({ project: core, outputDir: output });

    expect(result.ok).toBe(false);
    expect(result.diagnostic).toMatch(/^Could not start build tool "wheelhouse-no-such-python": /);
  });
});

describe('executeBuild', () => {
  const project: SubProject = { name: 'core', path: '/ws/core', hasDescriptor: true, outcome: 'unbuilt' };

  it('should return the tool result', () => {
    const tool: BuildTool = { description: 'fake', run: () => ({ ok: true, diagnostic: '' }) };

    expect(executeBuild(project, '/ws/dist', tool)).toEqual({ ok: true, diagnostic: '' });
  });

  it('should fold a throwing tool into a failure', () => {
    const tool: BuildTool = {
      description: 'fake-build',
      run: () => {
        throw new Error('segfault');
      },
    };

    expect(executeBuild(project, '/ws/dist', tool)).toEqual({
      ok: false,
      diagnostic: 'Build tool "fake-build" crashed: segfault',
    });
  });
});

describe('resolveInterpreter', () => {
  const layout = { root: '/ws', sourcesDir: '/ws/clients/python' };

  it('should keep an explicit interpreter name as is', () => {
    expect(resolveInterpreter('python3.12', layout, new MemoryWorkspaceEffects())).toBe('python3.12');
  });

  it('should resolve an explicit relative path against the workspace root', () => {
    expect(resolveInterpreter('tools/venv/bin/python', layout, new MemoryWorkspaceEffects()))
      .toBe('/ws/tools/venv/bin/python');
  });

  it('should keep an explicit absolute path', () => {
    expect(resolveInterpreter('/usr/bin/python3', layout, new MemoryWorkspaceEffects())).toBe('/usr/bin/python3');
  });

  it('should prefer the virtualenv under the sources directory', () => {
    const effects = new MemoryWorkspaceEffects().addFile('/ws/clients/python/.venv/bin/python');

    expect(resolveInterpreter(undefined, layout, effects)).toBe(
      process.platform === 'win32' ? 'python3' : '/ws/clients/python/.venv/bin/python'
    );
  });

  it('should fall back to python3', () => {
    expect(resolveInterpreter(undefined, layout, new MemoryWorkspaceEffects())).toBe('python3');
  });
});
