/**
 * @wheelhouse/config
 *
 * Configuration system for wheelhouse with YAML-first design
 * and Zod schema validation.
 *
 * @example Basic YAML configuration
 * ```yaml
 * # wheelhouse.config.yaml
 * projects: [core, idp, notification]
 * workspace:
 *   sourcesDir: clients/python
 *   distDir: dist/python
 * descriptor: pyproject.toml
 * cleanup: [build, dist, '*.egg-info']
 * ```
 */

// Core schema types and validation
export {
  type WheelhouseConfig,
  type ResolvedWheelhouseConfig,
  type WorkspaceLayoutConfig,
  type BuilderConfig,
  type ArtifactsConfig,
  ProjectNameSchema,
  WorkspaceLayoutSchema,
  BuilderConfigSchema,
  ArtifactsConfigSchema,
  WheelhouseConfigSchema,
  validateConfig,
  safeValidateConfig,
  getDefaultConfig,
} from './schema.js';

export { createSafeValidator, createStrictValidator, formatZodIssues } from './schema-utils.js';

// Config loading
export {
  CONFIG_FILE_NAME,
  ConfigLoadError,
  loadConfigFromFile,
  findConfigFile,
  loadWorkspaceConfig,
  type LoadedConfig,
} from './loader.js';

export { defineConfig } from './define-config.js';

export {
  WHEELHOUSE_DEFAULTS,
  NAME_PLACEHOLDER,
  OUTDIR_PLACEHOLDER,
  type WheelhouseDefaults,
} from './constants.js';
