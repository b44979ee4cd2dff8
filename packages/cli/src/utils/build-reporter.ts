/**
 * Console Build Reporter
 *
 * Human-readable progress and summary for `wheelhouse build`. Failure
 * diagnostics are printed as soon as the failing project completes.
 */

import { relative } from 'node:path';

import type {
  BuildOutcome,
  BuildReporter,
  RunResult,
  RunStartContext,
  SkippedProject,
  SkipReason,
  SubProject,
} from '@wheelhouse/core';
import chalk, { type ChalkInstance } from 'chalk';

import { formatBytes } from './format-bytes.js';

export interface ConsoleBuildReporterOptions {
  /** Chalk instance (default: auto-detected colors) */
  colors?: ChalkInstance;

  /** Line sink (default: console.log) */
  write?: (line: string) => void;

  /** Command shown in the install hint (default: 'pip install') */
  installCommand?: string;

  /** Artifact extensions; the first one is used in the install hint (default: ['.whl']) */
  artifactExtensions?: readonly string[];
}

const SEPARATOR_WIDTH = 50;

/**
 * Short description of why a candidate was skipped
 */
export function describeSkipReason(reason: SkipReason): string {
  switch (reason) {
    case 'missing-directory':
      return 'directory not found';
    case 'missing-descriptor':
      return 'no build descriptor';
  }
}

export class ConsoleBuildReporter implements BuildReporter {
  private readonly colors: ChalkInstance;
  private readonly write: (line: string) => void;
  private readonly installCommand: string;
  private readonly artifactExtension: string;

  constructor(options: ConsoleBuildReporterOptions = {}) {
    this.colors = options.colors ?? chalk;
    this.write = options.write ?? ((line: string) => console.log(line));
    this.installCommand = options.installCommand ?? 'pip install';
    this.artifactExtension = options.artifactExtensions?.[0] ?? '.whl';
  }

  onRunStart(context: RunStartContext): void {
    const { colors } = this;
    this.write(colors.bold.blue('📦 Building wheels'));
    this.write(colors.gray(`   Workspace:  ${context.layout.root}`));
    this.write(colors.gray(`   Sources:    ${context.layout.sourcesDir}`));
    this.write(colors.gray(`   Output:     ${context.layout.outputDir}`));
    this.write(colors.gray(`   Build tool: ${context.buildTool}`));
    this.write(colors.gray(`   Candidates: ${context.candidates.join(', ') || '(none)'}`));
    this.write('');
  }

  onProjectSkipped(skipped: SkippedProject): void {
    this.write(this.colors.gray(`⏭️  ${skipped.name}: skipped (${describeSkipReason(skipped.reason)})`));
  }

  onProjectStart(project: SubProject): void {
    this.write(this.colors.blue(`⏳ Building ${project.name}...`));
  }

  onProjectIsolated(project: SubProject, removed: string[]): void {
    if (removed.length === 0) {
      return;
    }
    const names = removed.map(path => relative(project.path, path));
    this.write(this.colors.gray(`   Removed stale: ${names.join(', ')}`));
  }

  onProjectComplete(outcome: BuildOutcome): void {
    const { colors } = this;
    if (outcome.status === 'success') {
      this.write(colors.green(`✅ ${outcome.name}`));
      return;
    }

    this.write(colors.red(`❌ ${outcome.name} failed`));
    for (const line of outcome.diagnostic.split('\n')) {
      this.write(colors.gray(`   ${line}`));
    }
  }

  onRunComplete(result: RunResult): void {
    const { colors } = this;
    this.write('');
    this.write(colors.gray('─'.repeat(SEPARATOR_WIDTH)));

    this.write(colors.green(`Succeeded (${result.successes.length}): ${result.successes.join(', ') || '-'}`));
    this.write(colors.red(`Failed (${result.failures.length}): ${result.failures.map(f => f.name).join(', ') || '-'}`));
    if (result.skipped.length > 0) {
      this.write(colors.gray(`Skipped (${result.skipped.length}): ${result.skipped.map(s => s.name).join(', ')}`));
    }

    this.write('');
    if (result.artifactScanError !== undefined) {
      this.write(colors.yellow(`⚠️  ${result.artifactScanError}`));
    } else if (result.artifacts.length === 0) {
      this.write(colors.gray(`No artifacts in ${result.outputDir}`));
    } else {
      this.write(colors.blue(`Artifacts in ${result.outputDir}:`));
      for (const artifact of result.artifacts) {
        this.write(`   ${artifact.fileName} (${formatBytes(artifact.sizeBytes)})`);
      }
      this.write('');
      this.write(colors.blue(`💡 Install with: ${this.installCommand} ${result.outputDir}/*${this.artifactExtension}`));
    }

    this.write(colors.gray('─'.repeat(SEPARATOR_WIDTH)));
    this.write(this.verdict(result));
  }

  private verdict(result: RunResult): string {
    const { colors } = this;
    const built = result.successes.length + result.failures.length;

    if (!result.passed) {
      return colors.red(`❌ ${result.failures.length} of ${built} sub-projects failed`);
    }
    if (built === 0) {
      return colors.green('✅ No eligible sub-projects, nothing to build');
    }
    return colors.green(`✅ All ${built} eligible sub-projects built`);
  }
}
