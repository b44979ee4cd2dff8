import { describe, it, expect, beforeEach, afterEach } from 'vitest';

import { safeExecResult } from '../src/safe-exec.js';
import { createTempTestDir, removeTempTestDir } from '../src/test-helpers.js';

describe('safeExecResult', () => {
  it('should capture stdout as a string on success', () => {
    const result = safeExecResult('node', ['--version']);

    expect(result.status).toBe(0);
    expect(result.stdout).toMatch(/^v\d+\.\d+\.\d+/);
    expect(result.error).toBeUndefined();
  });

  it('should return non-zero status and stderr without throwing', () => {
    const result = safeExecResult('node', [
      '-e',
      'process.stderr.write("missing dependency X"); process.exit(3)',
    ]);

    expect(result.status).toBe(3);
    expect(result.started).toBe(true);
    expect(result.stderr).toBe('missing dependency X');
    expect(result.error).toBeUndefined();
  });

  it('should keep captured output when the child overflows maxBuffer', () => {
    const result = safeExecResult(
      'node',
      ['-e', 'process.stderr.write("real stderr"); setTimeout(() => process.stdout.write("x".repeat(65536)), 200)'],
      { maxBuffer: 1024 }
    );

    expect(result.started).toBe(true);
    expect(result.stderr).toBe('real stderr');
    expect(result.error?.message).toMatch(/ENOBUFS$/);
  });

  it('should accept an absolute interpreter path', () => {
    const result = safeExecResult(process.execPath, ['-e', 'process.stdout.write("ok")']);

    expect(result.status).toBe(0);
    expect(result.stdout).toBe('ok');
  });

  it('should report a command that cannot be found with status -1 and an error', () => {
    const result = safeExecResult('nonexistent-command-xyz-123', ['--version']);

    expect(result.status).toBe(-1);
    expect(result.started).toBe(false);
    expect(result.stdout).toBe('');
    expect(result.stderr).toBe('');
    expect(result.error).toBeInstanceOf(Error);
  });

  it('should not interpret shell metacharacters', () => {
    if (process.platform === 'win32') {
      return; // node runs through a shell on Windows
    }

    const result = safeExecResult('node', ['-e', 'process.stdout.write("hello && ls")']);
    expect(result.stdout).toBe('hello && ls');
  });

  it('should pass custom environment variables', () => {
    const result = safeExecResult('node', ['-e', 'process.stdout.write(process.env.WH_EXEC_TEST ?? "")'], {
      env: { ...process.env, WH_EXEC_TEST: 'test-value' },
    });

    expect(result.stdout).toBe('test-value');
  });

  describe('working directory', () => {
    let testDir: string;

    beforeEach(async () => {
      testDir = await createTempTestDir('safe-exec');
    });

    afterEach(async () => {
      await removeTempTestDir(testDir);
    });

    it('should run the command inside cwd', () => {
      const result = safeExecResult('node', ['-e', 'process.stdout.write(process.cwd())'], {
        cwd: testDir,
      });

      expect(result.status).toBe(0);
      expect(result.stdout).toBe(testDir);
    });
  });
});
