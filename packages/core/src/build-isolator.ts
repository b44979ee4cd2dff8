/**
 * Build Isolator
 *
 * Removes stale build state of a single sub-project so every build starts
 * clean. Deletion is confined to the sub-project's own directory and never
 * reaches the shared output directory.
 */

import { join, posix, resolve } from 'node:path';

import { NAME_PLACEHOLDER } from '@wheelhouse/config';
import { isStrictlyInside } from '@wheelhouse/utils';
import micromatch from 'micromatch';

import type { SubProject } from './types.js';
import type { WorkspaceEffects } from './workspace-effects.js';

const GLOB_CHARS = /[*?[]/;

/**
 * Expand wildcard cleanup templates against the sub-project directory
 *
 * `{name}` is substituted first. A wildcard in the last segment is matched
 * against the entries of its parent directory (`*.egg-info` → `core.egg-info`,
 * `acme_core.egg-info`); matches come back sorted. Templates without a
 * wildcard, or whose parent is outside the sub-project, pass through
 * unchanged for resolveCleanupPaths to check.
 */
export function expandCleanupTemplates(
  project: SubProject,
  templates: readonly string[],
  effects: WorkspaceEffects
): string[] {
  const expanded: string[] = [];

  for (const template of templates) {
    const named = template.replaceAll(NAME_PLACEHOLDER, project.name).replaceAll('\\', '/');
    const pattern = posix.basename(named);
    const parent = posix.dirname(named);
    const parentPath = resolve(join(project.path, parent));

    if (!GLOB_CHARS.test(pattern) || GLOB_CHARS.test(parent)) {
      expanded.push(named);
      continue;
    }
    if (parentPath !== resolve(project.path) && !isStrictlyInside(project.path, parentPath)) {
      expanded.push(named);
      continue;
    }

    const matches = effects
      .listEntries(parentPath)
      .filter(entry => micromatch.isMatch(entry, pattern))
      .sort((a, b) => a.localeCompare(b));
    for (const match of matches) {
      expanded.push(parent === '.' ? match : posix.join(parent, match));
    }
  }

  return expanded;
}

/**
 * Resolve cleanup templates for a sub-project
 *
 * `{name}` is replaced by the project name, e.g. `{name}.egg-info` →
 * `core.egg-info`.
 *
 * @throws Error if a resolved path is not strictly inside the sub-project
 *   directory, or would remove (or contain) a protected path
 */
export function resolveCleanupPaths(
  project: SubProject,
  templates: readonly string[],
  protectedPaths: readonly string[] = []
): string[] {
  return templates.map(template => {
    const path = resolve(join(project.path, template.replaceAll(NAME_PLACEHOLDER, project.name)));

    if (!isStrictlyInside(project.path, path)) {
      throw new Error(`Cleanup path "${template}" escapes sub-project directory ${project.path}`);
    }

    for (const guarded of protectedPaths) {
      const target = resolve(guarded);
      if (target === path || isStrictlyInside(path, target)) {
        throw new Error(`Cleanup path "${template}" would remove protected directory ${target}`);
      }
    }

    return path;
  });
}

/**
 * Remove stale artifacts of one sub-project
 *
 * Missing paths are skipped. Removal errors propagate; the orchestrator
 * turns them into a failure outcome for this project only.
 *
 * @returns Paths that existed and were removed, in template order
 */
export function isolateBuild(
  project: SubProject,
  templates: readonly string[],
  effects: WorkspaceEffects,
  protectedPaths: readonly string[] = []
): string[] {
  const removed: string[] = [];
  const concrete = expandCleanupTemplates(project, templates, effects);

  for (const path of resolveCleanupPaths(project, concrete, protectedPaths)) {
    if (!removed.includes(path) && effects.exists(path)) {
      effects.removeTree(path);
      removed.push(path);
    }
  }

  return removed;
}
