import type { RunResult, SubProject } from '@wheelhouse/core';
import { Chalk } from 'chalk';
import { beforeEach, describe, expect, it } from 'vitest';

import { ConsoleBuildReporter, describeSkipReason } from '../../src/utils/build-reporter.js';

const RULE = '─'.repeat(50);

function project(name: string): SubProject {
  return { name, path: `/ws/clients/python/${name}`, hasDescriptor: true, outcome: 'unbuilt' };
}

describe('ConsoleBuildReporter', () => {
  let lines: string[];
  let reporter: ConsoleBuildReporter;

  beforeEach(() => {
    lines = [];
    reporter = new ConsoleBuildReporter({
      colors: new Chalk({ level: 0 }),
      write: line => lines.push(line),
    });
  });

  it('should print a banner with the resolved layout', () => {
    reporter.onRunStart({
      layout: { root: '/ws', sourcesDir: '/ws/clients/python', outputDir: '/ws/dist/python' },
      candidates: ['core', 'idp'],
      buildTool: 'python3 -m build --wheel --outdir {outdir}',
    });

    expect(lines).toEqual([
      '📦 Building wheels',
      '   Workspace:  /ws',
      '   Sources:    /ws/clients/python',
      '   Output:     /ws/dist/python',
      '   Build tool: python3 -m build --wheel --outdir {outdir}',
      '   Candidates: core, idp',
      '',
    ]);
  });

  it('should print multi-line diagnostics indented', () => {
    reporter.onProjectComplete({ name: 'idp', status: 'failure', diagnostic: 'line one\nline two' });

    expect(lines).toEqual(['❌ idp failed', '   line one', '   line two']);
  });

  it('should list removed paths relative to the project', () => {
    reporter.onProjectIsolated(project('core'), [
      '/ws/clients/python/core/build',
      '/ws/clients/python/core/core.egg-info',
    ]);
    reporter.onProjectIsolated(project('idp'), []);

    expect(lines).toEqual(['   Removed stale: build, core.egg-info']);
  });

  it('should print skipped candidates with a reason', () => {
    reporter.onProjectSkipped({ name: 'legacy', reason: 'missing-directory' });

    expect(lines).toEqual(['⏭️  legacy: skipped (directory not found)']);
  });

  it('should summarize a passing run with artifacts and an install hint', () => {
    const result: RunResult = {
      passed: true,
      timestamp: '2026-01-01T00:00:00.000Z',
      outputDir: '/ws/dist/python',
      successes: ['core', 'idp'],
      failures: [],
      skipped: [],
      artifacts: [
        { fileName: 'core-0.1.0-py3-none-any.whl', sizeBytes: 2048 },
        { fileName: 'idp-0.1.0-py3-none-any.whl', sizeBytes: 4096 },
      ],
    };

    reporter.onRunComplete(result);

    expect(lines).toEqual([
      '',
      RULE,
      'Succeeded (2): core, idp',
      'Failed (0): -',
      '',
      'Artifacts in /ws/dist/python:',
      '   core-0.1.0-py3-none-any.whl (2.0 KB)',
      '   idp-0.1.0-py3-none-any.whl (4.0 KB)',
      '',
      '💡 Install with: pip install /ws/dist/python/*.whl',
      RULE,
      '✅ All 2 eligible sub-projects built',
    ]);
  });

  it('should use the configured install command and extension', () => {
    const custom = new ConsoleBuildReporter({
      colors: new Chalk({ level: 0 }),
      write: line => lines.push(line),
      installCommand: 'uv pip install',
      artifactExtensions: ['.tar.gz', '.whl'],
    });

    custom.onRunComplete({
      passed: true,
      timestamp: '2026-01-01T00:00:00.000Z',
      outputDir: '/out',
      successes: ['core'],
      failures: [],
      skipped: [],
      artifacts: [{ fileName: 'core-0.1.0.tar.gz', sizeBytes: 10 }],
    });

    expect(lines).toContain('💡 Install with: uv pip install /out/*.tar.gz');
  });

  it('should warn instead of listing artifacts when the output directory was unreadable', () => {
    reporter.onRunComplete({
      passed: true,
      timestamp: '2026-01-01T00:00:00.000Z',
      outputDir: '/out',
      successes: ['core'],
      failures: [],
      skipped: [],
      artifacts: [],
      artifactScanError: 'Cannot read output directory (EACCES): /out',
    });

    expect(lines).toEqual([
      '',
      RULE,
      'Succeeded (1): core',
      'Failed (0): -',
      '',
      '⚠️  Cannot read output directory (EACCES): /out',
      RULE,
      '✅ All 1 eligible sub-projects built',
    ]);
  });
});

describe('describeSkipReason', () => {
  it('should describe both skip reasons', () => {
    expect(describeSkipReason('missing-directory')).toBe('directory not found');
    expect(describeSkipReason('missing-descriptor')).toBe('no build descriptor');
  });
});
