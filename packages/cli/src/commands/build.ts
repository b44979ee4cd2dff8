/**
 * Build Command
 *
 * Builds a wheel for every eligible sub-project and reports the outcome.
 * Default command: `wheelhouse` alone runs `wheelhouse build`.
 */

import { loadWorkspaceConfig, type LoadedConfig } from '@wheelhouse/config';
import { runBuild, type RunResult } from '@wheelhouse/core';
import type { Command } from 'commander';

import { ConsoleBuildReporter } from '../utils/build-reporter.js';
import { createColors } from '../utils/colors.js';
import { EXIT_CODES, type ExitCode } from '../utils/exit-codes.js';
import { reportFatalError } from '../utils/fatal-error.js';
import { logDebug } from '../utils/logger.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface BuildCommandOptions {
  /** Explicit config file (default: nearest wheelhouse.config.yaml) */
  config?: string;
  /** Print the RunResult as YAML on stdout; the report moves to stderr */
  yaml?: boolean;
  /** False with --no-color */
  color?: boolean;
}

/**
 * Execute a build run
 *
 * @returns Exit code: 0 all eligible built, 1 at least one failure, 2 fatal
 */
export async function runBuildCommand(
  options: BuildCommandOptions,
  cwd: string = process.cwd()
): Promise<ExitCode> {
  const colors = createColors(options.color ?? true);
  const write = options.yaml
    ? (line: string) => console.error(line)
    : (line: string) => console.log(line);

  let loaded: LoadedConfig;
  try {
    loaded = await loadWorkspaceConfig(cwd, options.config);
  } catch (error) {
    return reportFatalError(error, colors);
  }
  logDebug('config', loaded.fromFile ? 'Loaded configuration' : 'No config file found, using defaults', {
    configPath: loaded.configPath,
    projects: loaded.config.projects,
  });

  let result: RunResult;
  try {
    result = runBuild({
      config: loaded.config,
      entryPoint: loaded.configPath,
      reporter: new ConsoleBuildReporter({
        colors,
        write,
        installCommand: loaded.config.artifacts.installCommand,
        artifactExtensions: loaded.config.artifacts.extensions,
      }),
    });
  } catch (error) {
    return reportFatalError(error, colors);
  }

  if (options.yaml) {
    await outputYamlResult(result);
  }

  return result.passed ? EXIT_CODES.PASSED : EXIT_CODES.FAILED;
}

export function buildCommand(program: Command): void {
  program
    .command('build', { isDefault: true })
    .description('Build a wheel for every eligible sub-project (default command)')
    .option('-c, --config <path>', 'Path to wheelhouse.config.yaml')
    .option('--yaml', 'Print the run result as YAML on stdout (report goes to stderr)')
    .option('--no-color', 'Disable colored output')
    .action(async (options: BuildCommandOptions) => {
      const exitCode = await runBuildCommand(options);
      process.exit(exitCode);
    });
}
