/**
 * Workspace Locator
 *
 * Resolves the workspace root from the invoking entry point and derives the
 * sources and output directories.
 */

import { dirname, join, resolve } from 'node:path';

import { errorMessage, PathResolutionError } from './errors.js';
import type { WorkspaceLayout } from './types.js';
import type { WorkspaceEffects } from './workspace-effects.js';

export interface LocateWorkspaceOptions {
  /** File or directory the run was started from (e.g. the config file) */
  entryPoint: string;

  /** How many parent steps lead from the entry point to the root (default: 1) */
  ancestorSteps?: number;

  /** Sources directory, relative to the root */
  sourcesDir: string;

  /** Output directory, relative to the root */
  distDir: string;

  /** Create the output directory when missing (default: true) */
  createOutputDir?: boolean;
}

/**
 * Compute the workspace root by walking up a fixed number of steps
 *
 * @example
 * ```typescript
 * workspaceRootFrom('/ws/scripts/build.ts', 2); // '/ws'
 * workspaceRootFrom('/ws/wheelhouse.config.yaml', 1); // '/ws'
 * ```
 */
export function workspaceRootFrom(entryPoint: string, ancestorSteps: number): string {
  if (!Number.isInteger(ancestorSteps) || ancestorSteps < 0) {
    throw new RangeError(`ancestorSteps must be a non-negative integer, got ${ancestorSteps}`);
  }

  let root = resolve(entryPoint);
  for (let step = 0; step < ancestorSteps; step++) {
    root = dirname(root);
  }
  return root;
}

/**
 * Resolve the workspace layout
 *
 * Creates the output directory idempotently unless `createOutputDir` is false.
 *
 * @throws PathResolutionError if the root is not a readable directory or the
 *   output directory cannot be created
 */
export function locateWorkspace(
  options: LocateWorkspaceOptions,
  effects: WorkspaceEffects
): WorkspaceLayout {
  const root = workspaceRootFrom(options.entryPoint, options.ancestorSteps ?? 1);

  let rootIsDirectory: boolean;
  try {
    rootIsDirectory = effects.isDirectory(root);
  } catch (error) {
    throw new PathResolutionError(root, `Workspace root is not readable (${errorMessage(error)})`, { cause: error });
  }
  if (!rootIsDirectory) {
    throw new PathResolutionError(root, 'Workspace root is not a directory');
  }

  const layout: WorkspaceLayout = {
    root,
    sourcesDir: join(root, options.sourcesDir),
    outputDir: join(root, options.distDir),
  };

  if (options.createOutputDir ?? true) {
    try {
      effects.ensureDirectory(layout.outputDir);
    } catch (error) {
      throw new PathResolutionError(
        layout.outputDir,
        `Cannot create output directory (${errorMessage(error)})`,
        { cause: error }
      );
    }
  }

  return layout;
}
