/**
 * @wheelhouse/core
 *
 * Build orchestration for multi-project workspaces: discover buildable
 * sub-projects, isolate and build each one, aggregate the outcomes.
 *
 * @example
 * ```typescript
 * import { loadWorkspaceConfig } from '@wheelhouse/config';
 * import { runBuild } from '@wheelhouse/core';
 *
 * const { config, configPath } = await loadWorkspaceConfig();
 * const result = runBuild({ config, entryPoint: configPath });
 * ```
 */

export type {
  ProjectStatus,
  SkipReason,
  SubProject,
  BuildOutcome,
  FailedBuild,
  SkippedProject,
  Artifact,
  WorkspaceLayout,
  RunResult,
  BuildInvocation,
  BuildToolResult,
  BuildTool,
  RunStartContext,
  BuildReporter,
} from './types.js';

export { PathResolutionError, OutcomeAlreadyRecordedError, errorMessage } from './errors.js';

export {
  nodeWorkspaceEffects,
  ensureDir,
  type WorkspaceEffects,
  type FileEntry,
} from './workspace-effects.js';
export { MemoryWorkspaceEffects } from './memory-effects.js';

export { locateWorkspace, workspaceRootFrom, type LocateWorkspaceOptions } from './workspace-locator.js';
export { filterProjects, recordOutcome, type ProjectDiscovery } from './project-filter.js';
export { isolateBuild, resolveCleanupPaths } from './build-isolator.js';
export {
  ExternalBuildTool,
  executeBuild,
  resolveInterpreter,
  virtualenvInterpreters,
  type ExternalBuildToolOptions,
} from './build-executor.js';
export { aggregateRun, partitionOutcomes, collectArtifacts, type AggregateRunInput } from './run-aggregator.js';
export {
  runBuild,
  inspectWorkspace,
  createBuildTool,
  type WorkspaceOptions,
  type BuildRunOptions,
  type WorkspaceInspection,
} from './orchestrator.js';

export {
  RunResultSchema,
  FailedBuildSchema,
  SkippedProjectSchema,
  ArtifactSchema,
  safeValidateRunResult,
  type RunResultDocument,
} from './result-schema.js';
