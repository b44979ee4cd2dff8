/**
 * Core build types for wheelhouse
 *
 * These types describe discovered sub-projects, per-project outcomes and the
 * aggregate run result handed to reporters and the CLI.
 */

/**
 * Lifecycle state of a sub-project within one run
 */
export type ProjectStatus = 'unbuilt' | 'success' | 'failure';

/**
 * Why a candidate never entered the run
 */
export type SkipReason = 'missing-directory' | 'missing-descriptor';

/**
 * A named unit of the workspace, created at discovery time
 *
 * `outcome` starts as 'unbuilt' and is set exactly once via recordOutcome().
 */
export interface SubProject {
  /** Candidate name (directory name under the sources directory) */
  name: string;

  /** Absolute path to the sub-project directory */
  path: string;

  /** Does the directory exist and contain the build descriptor? */
  hasDescriptor: boolean;

  /** Set when hasDescriptor is false */
  skipReason?: SkipReason;

  /** Current outcome */
  outcome: ProjectStatus;
}

/**
 * Immutable per-project build record
 *
 * `diagnostic` is present iff status is 'failure'.
 */
export type BuildOutcome =
  | { readonly name: string; readonly status: 'success' }
  | { readonly name: string; readonly status: 'failure'; readonly diagnostic: string };

export type FailedBuild = Extract<BuildOutcome, { status: 'failure' }>;

/**
 * A candidate excluded from the run
 */
export interface SkippedProject {
  name: string;
  reason: SkipReason;
}

/**
 * A distributable file found in the shared output directory
 */
export interface Artifact {
  fileName: string;
  sizeBytes: number;
}

/**
 * Resolved workspace directories
 */
export interface WorkspaceLayout {
  /** Workspace root (absolute) */
  root: string;

  /** Directory holding sub-project sources (absolute) */
  sourcesDir: string;

  /** Shared artifact output directory (absolute) */
  outputDir: string;
}

/**
 * Overall build result
 *
 * `passed` is false iff at least one sub-project failed. Skipped candidates
 * appear in neither `successes` nor `failures`.
 */
export interface RunResult {
  /** Did every eligible sub-project build? */
  passed: boolean;

  /** ISO 8601 timestamp */
  timestamp: string;

  /** Shared output directory the artifacts were collected in */
  outputDir: string;

  /** Names of sub-projects that built, in build order */
  successes: string[];

  /** Failed sub-projects with their diagnostics, in build order */
  failures: FailedBuild[];

  /** Candidates that never entered the run */
  skipped: SkippedProject[];

  /** Artifacts in the output directory, sorted by file name */
  artifacts: Artifact[];

  /** Set when the output directory could not be listed after the builds */
  artifactScanError?: string;
}

/**
 * What the external build tool is asked to do for one sub-project
 */
export interface BuildInvocation {
  project: SubProject;
  outputDir: string;
}

/**
 * Two-valued result of one build tool invocation
 *
 * `diagnostic` is empty on success.
 */
export interface BuildToolResult {
  ok: boolean;
  diagnostic: string;
}

/**
 * An external build tool
 *
 * Implementations must block until the build finishes and should not throw
 * for a failing build.
 */
export interface BuildTool {
  /** Human-readable command line, used in banners and diagnostics */
  readonly description: string;

  run(invocation: BuildInvocation): BuildToolResult;
}

/**
 * Context handed to reporters when a run begins
 */
export interface RunStartContext {
  layout: WorkspaceLayout;
  candidates: readonly string[];
  buildTool: string;
}

/**
 * Presentation hooks
 *
 * Reporters observe the run; they never influence control flow or the result.
 */
export interface BuildReporter {
  /** Callback when the run starts (after the workspace is resolved) */
  onRunStart?: (_context: RunStartContext) => void;

  /** Callback when a candidate is excluded */
  onProjectSkipped?: (_skipped: SkippedProject) => void;

  /** Callback before a sub-project is isolated and built */
  onProjectStart?: (_project: SubProject) => void;

  /** Callback after stale artifacts were removed */
  onProjectIsolated?: (_project: SubProject, _removed: string[]) => void;

  /** Callback when a sub-project's outcome is known */
  onProjectComplete?: (_outcome: BuildOutcome) => void;

  /** Callback with the final result */
  onRunComplete?: (_result: RunResult) => void;
}
