/**
 * Build Executor
 *
 * Runs the external build frontend for one sub-project as a blocking child
 * process. A failing build is an expected result, never an exception.
 */

import { join, resolve } from 'node:path';

import { OUTDIR_PLACEHOLDER, WHEELHOUSE_DEFAULTS } from '@wheelhouse/config';
import { safeExecResult } from '@wheelhouse/utils';

import { errorMessage } from './errors.js';
import type { BuildInvocation, BuildTool, BuildToolResult, SubProject } from './types.js';
import type { WorkspaceEffects } from './workspace-effects.js';

export interface ExternalBuildToolOptions {
  /** Interpreter or executable (name on PATH or path) */
  interpreter: string;

  /** Arguments; `{outdir}` is replaced by the shared output directory */
  args: readonly string[];

  /** Extra environment variables, merged over process.env */
  env?: Record<string, string>;

  /** Captured output limit in bytes (default: DEFAULT_MAX_BUFFER) */
  maxBuffer?: number;
}

/**
 * Build frontend invoked through safeExecResult
 *
 * @example
 * ```typescript
 * const tool = new ExternalBuildTool({
 *   interpreter: 'python3',
 *   args: ['-m', 'build', '--wheel', '--outdir', '{outdir}'],
 * });
 * tool.run({ project, outputDir: '/ws/dist/python' });
 * ```
 */
export class ExternalBuildTool implements BuildTool {
  public readonly description: string;
  private readonly options: ExternalBuildToolOptions;

  constructor(options: ExternalBuildToolOptions) {
    this.options = options;
    this.description = [options.interpreter, ...options.args].join(' ');
  }

  /** Arguments with placeholders substituted for one invocation */
  argsFor(outputDir: string): string[] {
    return this.options.args.map(arg => arg.replaceAll(OUTDIR_PLACEHOLDER, outputDir));
  }

  run(invocation: BuildInvocation): BuildToolResult {
    const result = safeExecResult(this.options.interpreter, this.argsFor(invocation.outputDir), {
      cwd: invocation.project.path,
      env: this.options.env ? { ...process.env, ...this.options.env } : undefined,
      maxBuffer: this.options.maxBuffer,
    });

    if (!result.started) {
      // Spawn failure or the interpreter/tool is missing
      return {
        ok: false,
        diagnostic: `Could not start build tool "${this.options.interpreter}": ${result.error?.message ?? 'unknown error'}`,
      };
    }

    if (result.status !== 0 || result.error) {
      const output =
        result.stderr.trim() ||
        result.stdout.trim() ||
        `Build tool exited with code ${result.status}`;
      const diagnostic = result.error ? `${output}\nBuild tool stopped: ${result.error.message}` : output;
      return { ok: false, diagnostic };
    }

    return { ok: true, diagnostic: '' };
  }
}

/**
 * Candidate virtualenv interpreters under the sources directory
 */
export function virtualenvInterpreters(sourcesDir: string): string[] {
  return process.platform === 'win32'
    ? [join(sourcesDir, '.venv', 'Scripts', 'python.exe')]
    : [join(sourcesDir, '.venv', 'bin', 'python')];
}

/**
 * Pick the interpreter for the build frontend
 *
 * Order: explicit interpreter (relative paths resolve against the workspace
 * root), then the sources directory's .venv, then python3 on PATH.
 */
export function resolveInterpreter(
  explicit: string | undefined,
  layout: { root: string; sourcesDir: string },
  effects: WorkspaceEffects
): string {
  if (explicit !== undefined) {
    return /[\\/]/.test(explicit) ? resolve(layout.root, explicit) : explicit;
  }

  for (const candidate of virtualenvInterpreters(layout.sourcesDir)) {
    if (effects.isFile(candidate)) {
      return candidate;
    }
  }

  return WHEELHOUSE_DEFAULTS.INTERPRETER;
}

/**
 * Run the build tool for one sub-project
 *
 * Never throws: a tool that throws is folded into a failure result.
 */
export function executeBuild(project: SubProject, outputDir: string, tool: BuildTool): BuildToolResult {
  try {
    return tool.run({ project, outputDir });
  } catch (error) {
    return { ok: false, diagnostic: `Build tool "${tool.description}" crashed: ${errorMessage(error)}` };
  }
}
