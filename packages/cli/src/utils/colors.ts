/**
 * Color handling for console output
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

/**
 * Chalk instance honoring `--no-color`
 *
 * Returns the auto-detecting default instance when colors are enabled.
 */
export function createColors(enabled: boolean): ChalkInstance {
  return enabled ? chalk : new Chalk({ level: 0 });
}
