/**
 * Path Helpers
 *
 * Temp-directory and containment helpers shared by the orchestrator and tests.
 *
 * @package @wheelhouse/utils
 */

import { realpathSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { isAbsolute, relative, resolve, sep } from 'node:path';

/**
 * Get normalized temp directory path
 *
 * On Windows, tmpdir() may return 8.3 short names (C:\Users\RUNNER~1\...),
 * and on macOS it sits behind the /private symlink. Returns the real path so
 * that paths built from it compare equal to paths reported by the filesystem.
 */
export function normalizedTmpdir(): string {
  const temp = tmpdir();
  try {
    return realpathSync(temp);
  } catch {
    return temp;
  }
}

/**
 * Check whether `child` resolves to a location strictly inside `parent`
 *
 * The parent itself is not considered inside.
 *
 * @example
 * ```typescript
 * isStrictlyInside('/ws/core', '/ws/core/build');      // true
 * isStrictlyInside('/ws/core', '/ws/core/../idp');     // false
 * isStrictlyInside('/ws/core', '/ws/core');            // false
 * isStrictlyInside('/ws/core', '/ws/core/..cache');    // true
 * ```
 */
export function isStrictlyInside(parent: string, child: string): boolean {
  const rel = relative(resolve(parent), resolve(child));
  return rel !== '' && rel !== '..' && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}
