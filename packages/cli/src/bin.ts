#!/usr/bin/env node
/**
 * Wheelhouse CLI Entry Point
 *
 * Main executable for the wheelhouse command-line tool.
 */

import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

import { Command } from 'commander';

import { buildCommand } from './commands/build.js';
import { listCommand } from './commands/list.js';
import { EXIT_CODES } from './utils/exit-codes.js';
import { logError, logWarning } from './utils/logger.js';
import { readPackageVersion } from './utils/package-version.js';

const FALLBACK_VERSION = '0.0.0';

// Read version from package.json at runtime
const __dirname = dirname(fileURLToPath(import.meta.url));

let version = FALLBACK_VERSION;
try {
  version = readPackageVersion(__dirname) ?? FALLBACK_VERSION;
} catch (error) {
  logWarning('cli', 'Could not read package.json version, using fallback', error instanceof Error ? error : undefined);
}

const program = new Command();

program
  .name('wheelhouse')
  .description('Build Python wheels for every sub-project of a workspace')
  .version(version);

buildCommand(program);  // wheelhouse build (default)
listCommand(program);   // wheelhouse list

try {
  await program.parseAsync(process.argv);
} catch (error) {
  logError('cli', 'Unexpected failure', error instanceof Error ? error : new Error(String(error)));
  process.exit(EXIT_CODES.FATAL);
}
