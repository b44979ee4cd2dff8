/**
 * Run Aggregator
 *
 * Folds per-project outcomes into the final RunResult and lists the
 * artifacts collected in the shared output directory.
 */

import { errorMessage, PathResolutionError } from './errors.js';
import type { Artifact, BuildOutcome, FailedBuild, RunResult, SkippedProject } from './types.js';
import type { FileEntry, WorkspaceEffects } from './workspace-effects.js';

export interface AggregateRunInput {
  /** Outcomes in build order, one per eligible sub-project */
  outcomes: readonly BuildOutcome[];
  skipped: readonly SkippedProject[];
  outputDir: string;
  /** Extensions counted as artifacts (e.g. ['.whl']) */
  artifactExtensions: readonly string[];
  /** Clock for the result timestamp (default: current time) */
  now?: () => Date;
}

/**
 * Split outcomes into successes and failures, preserving order
 */
export function partitionOutcomes(outcomes: readonly BuildOutcome[]): {
  successes: string[];
  failures: FailedBuild[];
} {
  const successes: string[] = [];
  const failures: FailedBuild[] = [];

  for (const outcome of outcomes) {
    if (outcome.status === 'success') {
      successes.push(outcome.name);
    } else {
      failures.push(outcome);
    }
  }

  return { successes, failures };
}

/**
 * List distributable files in the output directory, sorted by name
 *
 * Extension matching is case-insensitive. Artifacts are not attributed to
 * sub-projects.
 *
 * @throws PathResolutionError if the output directory cannot be read
 */
export function collectArtifacts(
  outputDir: string,
  extensions: readonly string[],
  effects: WorkspaceEffects
): Artifact[] {
  const wanted = extensions.map(ext => ext.toLowerCase());

  let entries: FileEntry[];
  try {
    entries = effects.listFiles(outputDir);
  } catch (error) {
    throw new PathResolutionError(outputDir, `Cannot read output directory (${errorMessage(error)})`, { cause: error });
  }

  return entries
    .filter(entry => wanted.some(ext => entry.name.toLowerCase().endsWith(ext)))
    .map(entry => ({ fileName: entry.name, sizeBytes: entry.sizeBytes }))
    .sort((a, b) => a.fileName.localeCompare(b.fileName));
}

/**
 * Build the final RunResult
 *
 * `passed` is true iff there are no failures; skipped candidates do not count.
 * An unreadable output directory leaves `artifacts` empty and is recorded in
 * `artifactScanError`; by then per-project progress has been reported.
 */
export function aggregateRun(input: AggregateRunInput, effects: WorkspaceEffects): RunResult {
  const { successes, failures } = partitionOutcomes(input.outcomes);
  const now = input.now ?? (() => new Date());

  const result: RunResult = {
    passed: failures.length === 0,
    timestamp: now().toISOString(),
    outputDir: input.outputDir,
    successes,
    failures,
    skipped: [...input.skipped],
    artifacts: [],
  };

  try {
    result.artifacts = collectArtifacts(input.outputDir, input.artifactExtensions, effects);
  } catch (error) {
    if (!(error instanceof PathResolutionError)) {
      throw error;
    }
    result.artifactScanError = error.message;
  }

  return result;
}
