/**
 * Fatal error reporting
 *
 * Configuration and workspace errors end the command with EXIT_CODES.FATAL
 * before any per-project output. Anything else is a bug and propagates.
 */

import { basename } from 'node:path';

import { ConfigLoadError } from '@wheelhouse/config';
import { PathResolutionError } from '@wheelhouse/core';
import type { ChalkInstance } from 'chalk';

import { displayConfigErrors } from './config-error-reporter.js';
import { EXIT_CODES } from './exit-codes.js';
import { logDebug } from './logger.js';

/**
 * Report a fatal error on stderr
 *
 * @returns EXIT_CODES.FATAL
 * @throws The original error when it is neither a ConfigLoadError nor a PathResolutionError
 */
export function reportFatalError(error: unknown, colors: ChalkInstance): typeof EXIT_CODES.FATAL {
  if (error instanceof ConfigLoadError) {
    displayConfigErrors({ fileName: basename(error.configPath), errors: error.errors }, 5, colors);
    logDebug('config', 'Configuration rejected', { configPath: error.configPath, errors: error.errors });
    return EXIT_CODES.FATAL;
  }

  if (error instanceof PathResolutionError) {
    console.error(colors.red(`❌ ${error.message}`));
    logDebug('workspace', 'Workspace resolution failed', {
      path: error.path,
      cause: error.cause instanceof Error ? error.cause.message : undefined,
    });
    return EXIT_CODES.FATAL;
  }

  throw error;
}
