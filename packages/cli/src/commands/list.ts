/**
 * List Command
 *
 * Shows how the workspace resolves and which candidates are eligible,
 * without building or deleting anything.
 */

import { loadWorkspaceConfig } from '@wheelhouse/config';
import { inspectWorkspace, type SkipReason, type WorkspaceInspection } from '@wheelhouse/core';
import type { ChalkInstance } from 'chalk';
import type { Command } from 'commander';

import { describeSkipReason } from '../utils/build-reporter.js';
import { createColors } from '../utils/colors.js';
import { EXIT_CODES, type ExitCode } from '../utils/exit-codes.js';
import { reportFatalError } from '../utils/fatal-error.js';
import { outputYamlResult } from '../utils/yaml-output.js';

export interface ListCommandOptions {
  config?: string;
  yaml?: boolean;
  color?: boolean;
}

/**
 * Machine-readable workspace listing (`wheelhouse list --yaml`)
 */
export interface WorkspaceListing {
  configPath: string;
  configFound: boolean;
  root: string;
  sourcesDir: string;
  outputDir: string;
  buildTool: string;
  projects: Array<{
    name: string;
    path: string;
    eligible: boolean;
    skipReason?: SkipReason;
  }>;
}

function toListing(inspection: WorkspaceInspection, configPath: string, configFound: boolean): WorkspaceListing {
  return {
    configPath,
    configFound,
    root: inspection.layout.root,
    sourcesDir: inspection.layout.sourcesDir,
    outputDir: inspection.layout.outputDir,
    buildTool: inspection.buildTool.description,
    projects: inspection.discovery.projects.map(project => ({
      name: project.name,
      path: project.path,
      eligible: project.hasDescriptor,
      ...(project.skipReason === undefined ? {} : { skipReason: project.skipReason }),
    })),
  };
}

function displayListing(listing: WorkspaceListing, colors: ChalkInstance): void {
  console.log(colors.bold.blue('📦 Workspace'));
  console.log(colors.gray(`   Config:     ${listing.configFound ? listing.configPath : '(defaults)'}`));
  console.log(colors.gray(`   Root:       ${listing.root}`));
  console.log(colors.gray(`   Sources:    ${listing.sourcesDir}`));
  console.log(colors.gray(`   Output:     ${listing.outputDir}`));
  console.log(colors.gray(`   Build tool: ${listing.buildTool}`));
  console.log();

  for (const project of listing.projects) {
    if (project.skipReason === undefined) {
      console.log(colors.green(`✅ ${project.name}`));
    } else {
      console.log(colors.gray(`⏭️  ${project.name} (${describeSkipReason(project.skipReason)})`));
    }
  }

  const eligible = listing.projects.filter(project => project.eligible).length;
  console.log();
  console.log(`${eligible} of ${listing.projects.length} sub-projects eligible`);
}

/**
 * Execute the listing
 *
 * @returns Exit code: 0, or 2 for configuration and workspace errors
 */
export async function runListCommand(
  options: ListCommandOptions,
  cwd: string = process.cwd()
): Promise<ExitCode> {
  const colors = createColors(options.color ?? true);

  let listing: WorkspaceListing;
  try {
    const loaded = await loadWorkspaceConfig(cwd, options.config);
    const inspection = inspectWorkspace({ config: loaded.config, entryPoint: loaded.configPath });
    listing = toListing(inspection, loaded.configPath, loaded.fromFile);
  } catch (error) {
    return reportFatalError(error, colors);
  }

  if (options.yaml) {
    await outputYamlResult(listing);
  } else {
    displayListing(listing, colors);
  }

  return EXIT_CODES.PASSED;
}

export function listCommand(program: Command): void {
  program
    .command('list')
    .description('Show the resolved workspace and which sub-projects are eligible')
    .option('-c, --config <path>', 'Path to wheelhouse.config.yaml')
    .option('--yaml', 'Print the listing as YAML on stdout')
    .option('--no-color', 'Disable colored output')
    .action(async (options: ListCommandOptions) => {
      const exitCode = await runListCommand(options);
      process.exit(exitCode);
    });
}
