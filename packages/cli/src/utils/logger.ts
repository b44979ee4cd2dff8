/**
 * Diagnostic logging to stderr
 *
 * `[timestamp] [LEVEL] [category] message` lines. Debug and warning lines
 * need WH_DEBUG=1; errors always print.
 */

export type LogCategory =
  | 'config'
  | 'workspace'
  | 'build'
  | 'cli';

type LogLevel = 'DEBUG' | 'WARN' | 'ERROR';

function debugEnabled(): boolean {
  return process.env.WH_DEBUG === '1';
}

function writeLine(level: LogLevel, category: LogCategory, message: string): void {
  console.error(`[${new Date().toISOString()}] [${level}] [${category}] ${message}`);
}

function writeError(error: Error | undefined): void {
  if (!error) {
    return;
  }
  console.error(`Error: ${error.message}`);
  if (error.stack) {
    console.error(error.stack);
  }
}

/**
 * @example
 * ```typescript
 * logDebug('config', 'Loaded configuration', { configPath });
 * ```
 */
export function logDebug(category: LogCategory, message: string, metadata?: Record<string, unknown>): void {
  if (!debugEnabled()) {
    return;
  }
  writeLine('DEBUG', category, message);
  if (metadata) {
    console.error(JSON.stringify(metadata, null, 2));
  }
}

/** Recoverable problem; the run goes on */
export function logWarning(category: LogCategory, message: string, error?: Error): void {
  if (!debugEnabled()) {
    return;
  }
  writeLine('WARN', category, message);
  writeError(error);
}

export function logError(category: LogCategory, message: string, error?: Error): void {
  writeLine('ERROR', category, message);
  writeError(error);
}
