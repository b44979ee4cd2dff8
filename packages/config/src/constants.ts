/**
 * Configuration Constants
 *
 * Single source of truth for default values. A workspace without a
 * wheelhouse.config.yaml builds exactly what is declared here.
 *
 * @packageDocumentation
 */

/**
 * Placeholder replaced by the sub-project name in cleanup templates
 */
export const NAME_PLACEHOLDER = '{name}';

/**
 * Placeholder replaced by the absolute shared output directory in builder args
 */
export const OUTDIR_PLACEHOLDER = '{outdir}';

/**
 * Default configuration values
 *
 * @example
 * ```typescript
 * import { WHEELHOUSE_DEFAULTS } from '@wheelhouse/config';
 *
 * const descriptor = config.descriptor ?? WHEELHOUSE_DEFAULTS.DESCRIPTOR;
 * ```
 */
export const WHEELHOUSE_DEFAULTS = {
  /**
   * Candidate sub-projects, in build order
   */
  PROJECTS: ['core', 'idp', 'notification'] as const,

  /**
   * Directory holding sub-project sources, relative to the workspace root
   */
  SOURCES_DIR: 'clients/python' as const,

  /**
   * Shared artifact directory, relative to the workspace root
   */
  DIST_DIR: 'dist/python' as const,

  /**
   * File whose presence marks a sub-project as buildable
   */
  DESCRIPTOR: 'pyproject.toml' as const,

  /**
   * Stale-artifact directories removed before each build
   *
   * `*.egg-info` covers metadata named after the project directory as well as
   * after the distribution (`acme_core.egg-info` for `acme-core`).
   */
  CLEANUP: ['build', 'dist', '*.egg-info'] as const,

  /**
   * Interpreter used when no virtualenv and no explicit interpreter exist
   */
  INTERPRETER: 'python3' as const,

  /**
   * Arguments passed to the interpreter (PEP 517 build frontend)
   */
  BUILDER_ARGS: ['-m', 'build', '--wheel', '--outdir', OUTDIR_PLACEHOLDER] as const,

  /**
   * Extensions of distributable artifacts
   */
  ARTIFACT_EXTENSIONS: ['.whl'] as const,

  /**
   * Command shown in the installation hint
   */
  INSTALL_COMMAND: 'pip install' as const,
} as const;

export type WheelhouseDefaults = typeof WHEELHOUSE_DEFAULTS;
