/**
 * Build orchestrator
 *
 * Resolves the workspace, then isolates and builds each eligible sub-project
 * strictly one after another in declaration order. Per-project failures are
 * recorded as data; only workspace-level problems abort the run.
 */

import type { ResolvedWheelhouseConfig } from '@wheelhouse/config';

import { isolateBuild } from './build-isolator.js';
import { executeBuild, ExternalBuildTool, resolveInterpreter } from './build-executor.js';
import { errorMessage } from './errors.js';
import { filterProjects, recordOutcome, type ProjectDiscovery } from './project-filter.js';
import { aggregateRun } from './run-aggregator.js';
import type {
  BuildOutcome,
  BuildReporter,
  BuildTool,
  RunResult,
  SubProject,
  WorkspaceLayout,
} from './types.js';
import { nodeWorkspaceEffects, type WorkspaceEffects } from './workspace-effects.js';
import { locateWorkspace } from './workspace-locator.js';

export interface WorkspaceOptions {
  /** Validated configuration (candidate list, layout, builder) */
  config: ResolvedWheelhouseConfig;

  /** File the run was started from; the root is `ancestorSteps` above it */
  entryPoint: string;

  /** Parent steps from entry point to root (default: 1) */
  ancestorSteps?: number;

  /** Filesystem access (default: node:fs) */
  effects?: WorkspaceEffects;
}

export interface BuildRunOptions extends WorkspaceOptions {
  /** Build tool (default: ExternalBuildTool from config.builder) */
  buildTool?: BuildTool;

  /** Presentation hooks */
  reporter?: BuildReporter;

  /** Clock for the result timestamp */
  now?: () => Date;
}

/**
 * Workspace state without building anything
 */
export interface WorkspaceInspection {
  layout: WorkspaceLayout;
  discovery: ProjectDiscovery;
  buildTool: ExternalBuildTool;
}

/**
 * Create the configured external build tool
 */
export function createBuildTool(
  config: ResolvedWheelhouseConfig,
  layout: WorkspaceLayout,
  effects: WorkspaceEffects = nodeWorkspaceEffects
): ExternalBuildTool {
  return new ExternalBuildTool({
    interpreter: resolveInterpreter(config.builder.interpreter, layout, effects),
    args: config.builder.args,
    env: config.builder.env,
  });
}

/**
 * Resolve layout and eligibility without creating or deleting anything
 *
 * @throws PathResolutionError if the workspace root cannot be used
 */
export function inspectWorkspace(options: WorkspaceOptions): WorkspaceInspection {
  const effects = options.effects ?? nodeWorkspaceEffects;
  const { config } = options;

  const layout = locateWorkspace(
    {
      entryPoint: options.entryPoint,
      ancestorSteps: options.ancestorSteps,
      sourcesDir: config.workspace.sourcesDir,
      distDir: config.workspace.distDir,
      createOutputDir: false,
    },
    effects
  );

  return {
    layout,
    discovery: filterProjects(config.projects, layout.sourcesDir, config.descriptor, effects),
    buildTool: createBuildTool(config, layout, effects),
  };
}

function buildProject(
  project: SubProject,
  layout: WorkspaceLayout,
  cleanup: readonly string[],
  buildTool: BuildTool,
  effects: WorkspaceEffects,
  reporter: BuildReporter
): BuildOutcome {
  let removed: string[];
  try {
    removed = isolateBuild(project, cleanup, effects, [layout.outputDir]);
  } catch (error) {
    return {
      name: project.name,
      status: 'failure',
      diagnostic: `Failed to remove stale artifacts: ${errorMessage(error)}`,
    };
  }
  reporter.onProjectIsolated?.(project, removed);

  const result = executeBuild(project, layout.outputDir, buildTool);
  if (result.ok) {
    return { name: project.name, status: 'success' };
  }
  return {
    name: project.name,
    status: 'failure',
    diagnostic: result.diagnostic || 'Build failed without diagnostic output',
  };
}

/**
 * Run the whole build
 *
 * @returns RunResult; `passed` decides the process exit code
 * @throws PathResolutionError if the workspace cannot be resolved (no partial report)
 *
 * @example
 * ```typescript
 * const { config, configPath } = await loadWorkspaceConfig();
 * const result = runBuild({ config, entryPoint: configPath });
 * process.exit(result.passed ? 0 : 1);
 * ```
 */
export function runBuild(options: BuildRunOptions): RunResult {
  const effects = options.effects ?? nodeWorkspaceEffects;
  const reporter = options.reporter ?? {};
  const { config } = options;

  const layout = locateWorkspace(
    {
      entryPoint: options.entryPoint,
      ancestorSteps: options.ancestorSteps,
      sourcesDir: config.workspace.sourcesDir,
      distDir: config.workspace.distDir,
    },
    effects
  );
  const discovery = filterProjects(config.projects, layout.sourcesDir, config.descriptor, effects);
  const buildTool = options.buildTool ?? createBuildTool(config, layout, effects);

  reporter.onRunStart?.({
    layout,
    candidates: config.projects,
    buildTool: buildTool.description,
  });

  const outcomes: BuildOutcome[] = [];
  for (const project of discovery.projects) {
    if (project.skipReason !== undefined) {
      reporter.onProjectSkipped?.({ name: project.name, reason: project.skipReason });
      continue;
    }

    reporter.onProjectStart?.(project);
    const outcome = buildProject(project, layout, config.cleanup, buildTool, effects, reporter);
    recordOutcome(project, outcome);
    outcomes.push(outcome);
    reporter.onProjectComplete?.(outcome);
  }

  const result = aggregateRun(
    {
      outcomes,
      skipped: discovery.skipped,
      outputDir: layout.outputDir,
      artifactExtensions: config.artifacts.extensions,
      now: options.now,
    },
    effects
  );
  reporter.onRunComplete?.(result);

  return result;
}
