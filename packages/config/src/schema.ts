/**
 * Configuration Schema with Zod Validation
 *
 * Runtime validation and type safety for wheelhouse.config.yaml.
 */

import { isAbsolute } from 'node:path';

import { z } from 'zod';

import { WHEELHOUSE_DEFAULTS } from './constants.js';
import { createSafeValidator, createStrictValidator } from './schema-utils.js';

/**
 * A relative path segment list that cannot climb out of its base directory
 */
function isContainedRelativePath(value: string): boolean {
  if (isAbsolute(value) || value === '.') {
    return false;
  }
  return !value.split(/[\\/]/).includes('..');
}

/**
 * Sub-project name (a single directory name under the sources directory)
 */
export const ProjectNameSchema = z
  .string()
  .min(1, 'Project name cannot be empty')
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, 'Project name must be a plain directory name');

/**
 * Workspace Layout Schema
 */
export const WorkspaceLayoutSchema = z.object({
  /** Directory holding sub-project sources, relative to the workspace root */
  sourcesDir: z
    .string()
    .min(1, 'sourcesDir cannot be empty')
    .refine(isContainedRelativePath, 'sourcesDir must be relative to the workspace root')
    .default(WHEELHOUSE_DEFAULTS.SOURCES_DIR),

  /** Shared artifact output directory, relative to the workspace root */
  distDir: z
    .string()
    .min(1, 'distDir cannot be empty')
    .refine(isContainedRelativePath, 'distDir must be relative to the workspace root')
    .default(WHEELHOUSE_DEFAULTS.DIST_DIR),
}).strict();

export type WorkspaceLayoutConfig = z.infer<typeof WorkspaceLayoutSchema>;

/**
 * Builder Schema
 *
 * How the external build frontend is invoked for each sub-project.
 */
export const BuilderConfigSchema = z.object({
  /**
   * Interpreter to run (optional)
   * Default: <sourcesDir>/.venv/bin/python when it exists, otherwise python3
   */
  interpreter: z.string().min(1, 'interpreter cannot be empty').optional(),

  /** Arguments passed to the interpreter; `{outdir}` is replaced by the output directory */
  args: z
    .array(z.string())
    .min(1, 'builder.args must contain at least one argument')
    .default([...WHEELHOUSE_DEFAULTS.BUILDER_ARGS]),

  /** Optional: extra environment variables for the build process */
  env: z.record(z.string(), z.string()).optional(),
}).strict();

export type BuilderConfig = z.infer<typeof BuilderConfigSchema>;

/**
 * Artifacts Schema
 */
export const ArtifactsConfigSchema = z.object({
  /** File extensions counted as distributable artifacts */
  extensions: z
    .array(z.string().regex(/^\.[A-Za-z0-9.]+$/, 'Extension must start with a dot (e.g. ".whl")'))
    .min(1, 'At least one artifact extension required')
    .default([...WHEELHOUSE_DEFAULTS.ARTIFACT_EXTENSIONS]),

  /** Command shown in the installation hint */
  installCommand: z.string().min(1).default(WHEELHOUSE_DEFAULTS.INSTALL_COMMAND),
}).strict();

export type ArtifactsConfig = z.infer<typeof ArtifactsConfigSchema>;

/**
 * Full Configuration Schema
 */
export const WheelhouseConfigSchema = z.object({
  /** Candidate sub-projects in build order (declaration order = build order) */
  projects: z
    .array(ProjectNameSchema)
    .default([...WHEELHOUSE_DEFAULTS.PROJECTS])
    .refine(
      names => new Set(names).size === names.length,
      'Project names must be unique'
    ),

  /** Workspace layout */
  workspace: WorkspaceLayoutSchema.optional().default({}),

  /** File whose presence marks a sub-project as buildable */
  descriptor: z
    .string()
    .min(1, 'descriptor cannot be empty')
    .refine(isContainedRelativePath, 'descriptor must be relative to the sub-project')
    .default(WHEELHOUSE_DEFAULTS.DESCRIPTOR),

  /**
   * Stale-artifact directories removed before each build
   * `{name}` is replaced by the sub-project name
   */
  cleanup: z
    .array(
      z
        .string()
        .min(1, 'Cleanup entry cannot be empty')
        .refine(isContainedRelativePath, 'Cleanup entry must stay inside the sub-project directory')
    )
    .default([...WHEELHOUSE_DEFAULTS.CLEANUP]),

  /** External build tool invocation */
  builder: BuilderConfigSchema.optional().default({}),

  /** Artifact discovery and install hint */
  artifacts: ArtifactsConfigSchema.optional().default({}),
}).strict();

// Input type (before defaults applied) for hand-written configs
export type WheelhouseConfig = z.input<typeof WheelhouseConfigSchema>;

// Output type (defaults applied) consumed by the orchestrator
export type ResolvedWheelhouseConfig = z.output<typeof WheelhouseConfigSchema>;

/**
 * Validate configuration object
 *
 * @returns Validated configuration with defaults applied
 * @throws ZodError if validation fails
 */
export const validateConfig = createStrictValidator(WheelhouseConfigSchema);

/**
 * Safe validation function for WheelhouseConfig
 */
export const safeValidateConfig = createSafeValidator(WheelhouseConfigSchema);

/**
 * Configuration with every default applied
 */
export function getDefaultConfig(): ResolvedWheelhouseConfig {
  return validateConfig({});
}
