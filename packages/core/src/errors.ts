/**
 * Error types raised by the build orchestrator
 *
 * Per-project failures never surface as errors; they become BuildOutcome
 * records. Only workspace-level problems and programming errors are thrown.
 */

/**
 * The workspace root or the shared output directory cannot be used
 *
 * Fatal to the whole run: no partial report is produced.
 */
export class PathResolutionError extends Error {
  public readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = 'PathResolutionError';
    this.path = path;
  }
}

/**
 * A sub-project outcome was assigned twice in the same run
 */
export class OutcomeAlreadyRecordedError extends Error {
  public readonly projectName: string;

  constructor(projectName: string, previous: string) {
    super(`Outcome for "${projectName}" already recorded as ${previous}`);
    this.name = 'OutcomeAlreadyRecordedError';
    this.projectName = projectName;
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
