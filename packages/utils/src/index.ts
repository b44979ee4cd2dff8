/**
 * @wheelhouse/utils
 *
 * Common utilities for wheelhouse packages.
 * This is the foundational package with NO dependencies on other wheelhouse packages.
 *
 * @package @wheelhouse/utils
 */

// Safe command execution
export {
  safeExecResult,
  DEFAULT_MAX_BUFFER,
  type SafeExecOptions,
  type SafeExecResult
} from './safe-exec.js';

// Path helpers
export {
  normalizedTmpdir,
  isStrictlyInside
} from './path-helpers.js';

// Test helpers
export {
  createTempTestDir,
  removeTempTestDir
} from './test-helpers.js';
