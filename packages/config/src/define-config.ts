/**
 * TypeScript-First Config Helper
 */

import type { WheelhouseConfig } from './schema.js';

/**
 * Define a wheelhouse configuration
 *
 * Type-safe identity helper for IDE autocomplete. Performs no runtime work.
 *
 * @example
 * ```typescript
 * import { defineConfig, validateConfig } from '@wheelhouse/config';
 *
 * const config = validateConfig(defineConfig({
 *   projects: ['core', 'idp'],
 *   workspace: { sourcesDir: 'clients/python', distDir: 'dist/python' },
 * }));
 * ```
 */
export function defineConfig(config: WheelhouseConfig): WheelhouseConfig {
  return config;
}
