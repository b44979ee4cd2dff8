import { describe, it, expect } from 'vitest';

import { PathResolutionError } from '../src/errors.js';
import { MemoryWorkspaceEffects } from '../src/memory-effects.js';
import { locateWorkspace, workspaceRootFrom } from '../src/workspace-locator.js';

const LAYOUT = { sourcesDir: 'clients/python', distDir: 'dist/python' };

describe('workspaceRootFrom', () => {
  it('should walk up the requested number of steps', () => {
    expect(workspaceRootFrom('/ws/scripts/build.ts', 2)).toBe('/ws');
    expect(workspaceRootFrom('/ws/wheelhouse.config.yaml', 1)).toBe('/ws');
  });

  it('should return the entry point itself for zero steps', () => {
    expect(workspaceRootFrom('/ws', 0)).toBe('/ws');
  });

  it('should reject negative or fractional steps', () => {
    expect(() => workspaceRootFrom('/ws', -1)).toThrow(RangeError);
    expect(() => workspaceRootFrom('/ws', 1.5)).toThrow(RangeError);
  });
});

describe('locateWorkspace', () => {
  it('should derive sources and output directories from the root', () => {
    const effects = new MemoryWorkspaceEffects().addFile('/ws/wheelhouse.config.yaml');

    const layout = locateWorkspace({ entryPoint: '/ws/wheelhouse.config.yaml', ...LAYOUT }, effects);

    expect(layout).toEqual({
      root: '/ws',
      sourcesDir: '/ws/clients/python',
      outputDir: '/ws/dist/python',
    });
  });

  it('should create the output directory', () => {
    const effects = new MemoryWorkspaceEffects().addDirectory('/ws');

    locateWorkspace({ entryPoint: '/ws/wheelhouse.config.yaml', ...LAYOUT }, effects);

    expect(effects.isDirectory('/ws/dist/python')).toBe(true);
  });

  it('should be idempotent and keep existing artifacts', () => {
    const effects = new MemoryWorkspaceEffects()
      .addDirectory('/ws')
      .addFile('/ws/dist/python/core-0.1.0-py3-none-any.whl', 100);
    const options = { entryPoint: '/ws/wheelhouse.config.yaml', ...LAYOUT };

    locateWorkspace(options, effects);
    locateWorkspace(options, effects);

    expect(effects.isFile('/ws/dist/python/core-0.1.0-py3-none-any.whl')).toBe(true);
  });

  it('should honour ancestorSteps', () => {
    const effects = new MemoryWorkspaceEffects().addFile('/ws/scripts/build.ts');

    const layout = locateWorkspace(
      { entryPoint: '/ws/scripts/build.ts', ancestorSteps: 2, ...LAYOUT },
      effects
    );

    expect(layout.root).toBe('/ws');
  });

  it('should not create the output directory when createOutputDir is false', () => {
    const effects = new MemoryWorkspaceEffects().addDirectory('/ws');

    locateWorkspace(
      { entryPoint: '/ws/wheelhouse.config.yaml', createOutputDir: false, ...LAYOUT },
      effects
    );

    expect(effects.exists('/ws/dist/python')).toBe(false);
  });

  it('should throw PathResolutionError when the root does not exist', () => {
    const effects = new MemoryWorkspaceEffects();

    expect(() => locateWorkspace({ entryPoint: '/missing/wheelhouse.config.yaml', ...LAYOUT }, effects))
      .toThrow(PathResolutionError);
  });

  it('should throw PathResolutionError when the output directory cannot be created', () => {
    const effects = new MemoryWorkspaceEffects().addDirectory('/ws');
    effects.failEnsureFor.add('/ws/dist/python');

    try {
      locateWorkspace({ entryPoint: '/ws/wheelhouse.config.yaml', ...LAYOUT }, effects);
      expect.fail('Should have thrown');
    } catch (error) {
      expect(error).toBeInstanceOf(PathResolutionError);
      if (error instanceof PathResolutionError) {
        expect(error.path).toBe('/ws/dist/python');
        expect(error.message).toContain('Cannot create output directory');
      }
    }
  });
});
