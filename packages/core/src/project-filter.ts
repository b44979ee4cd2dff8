/**
 * Project Filter
 *
 * Decides which candidates are buildable. The candidate list comes from
 * configuration; the sources directory is never scanned.
 */

import { join } from 'node:path';

import { errorMessage, OutcomeAlreadyRecordedError, PathResolutionError } from './errors.js';
import type { BuildOutcome, SkippedProject, SubProject } from './types.js';
import type { WorkspaceEffects } from './workspace-effects.js';

/**
 * Discovery result
 *
 * All three lists keep candidate declaration order.
 */
export interface ProjectDiscovery {
  /** Every candidate, eligible or not */
  projects: SubProject[];
  eligible: SubProject[];
  skipped: SkippedProject[];
}

function discoverOne(
  name: string,
  sourcesDir: string,
  descriptorFile: string,
  effects: WorkspaceEffects
): SubProject {
  const path = join(sourcesDir, name);

  try {
    if (!effects.isDirectory(path)) {
      return { name, path, hasDescriptor: false, skipReason: 'missing-directory', outcome: 'unbuilt' };
    }
    if (!effects.isFile(join(path, descriptorFile))) {
      return { name, path, hasDescriptor: false, skipReason: 'missing-descriptor', outcome: 'unbuilt' };
    }
  } catch (error) {
    throw new PathResolutionError(path, `Cannot inspect sub-project (${errorMessage(error)})`, { cause: error });
  }

  return { name, path, hasDescriptor: true, outcome: 'unbuilt' };
}

/**
 * Classify candidates by descriptor presence
 *
 * A missing directory or descriptor means "not applicable", never failure.
 *
 * @throws PathResolutionError if a candidate path cannot be inspected at all
 */
export function filterProjects(
  candidates: readonly string[],
  sourcesDir: string,
  descriptorFile: string,
  effects: WorkspaceEffects
): ProjectDiscovery {
  const projects = candidates.map(name => discoverOne(name, sourcesDir, descriptorFile, effects));

  const skipped: SkippedProject[] = [];
  for (const project of projects) {
    if (project.skipReason !== undefined) {
      skipped.push({ name: project.name, reason: project.skipReason });
    }
  }

  return {
    projects,
    eligible: projects.filter(project => project.hasDescriptor),
    skipped,
  };
}

/**
 * Set a sub-project's outcome (exactly once)
 *
 * @throws OutcomeAlreadyRecordedError if the outcome was already set
 */
export function recordOutcome(project: SubProject, outcome: BuildOutcome): void {
  if (project.outcome !== 'unbuilt') {
    throw new OutcomeAlreadyRecordedError(project.name, project.outcome);
  }
  project.outcome = outcome.status;
}
