/**
 * Shared Test Helpers
 *
 * Common utilities for tests across all packages
 */

import { mkdir, rm } from 'node:fs/promises';
import { join } from 'node:path';

import { normalizedTmpdir } from './path-helpers.js';

/**
 * Create a unique temporary test directory
 *
 * @returns Path to the created temporary directory
 *
 * @example
 * ```typescript
 * let testDir: string;
 * beforeEach(async () => {
 *   testDir = await createTempTestDir();
 * });
 * afterEach(async () => {
 *   await removeTempTestDir(testDir);
 * });
 * ```
 */
export async function createTempTestDir(prefix = 'wheelhouse-test'): Promise<string> {
  const testDir = join(normalizedTmpdir(), `${prefix}-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await mkdir(testDir, { recursive: true });
  return testDir;
}

/**
 * Remove a temporary test directory (missing directories are ignored)
 */
export async function removeTempTestDir(testDir: string): Promise<void> {
  await rm(testDir, { recursive: true, force: true });
}
