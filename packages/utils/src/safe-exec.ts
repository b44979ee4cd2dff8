import { spawnSync, type SpawnSyncOptions } from 'node:child_process';

import which from 'which';

/**
 * Default output buffer for captured child output (64 MiB)
 *
 * spawnSync kills the child with ENOBUFS once this is exceeded, and build
 * frontends can be very chatty on stdout.
 */
export const DEFAULT_MAX_BUFFER = 64 * 1024 * 1024;

/**
 * Options for safe command execution
 */
export interface SafeExecOptions {
  /** Environment variables (default: inherited from process.env) */
  env?: NodeJS.ProcessEnv;
  /** Working directory */
  cwd?: string;
  /** Maximum output buffer size in bytes (default: DEFAULT_MAX_BUFFER) */
  maxBuffer?: number;
}

/**
 * Result of a safe command execution
 */
export interface SafeExecResult {
  /** Exit code (0 = success, -1 = never started or killed by a signal) */
  status: number;
  /** Whether a child process was spawned (false when resolution or spawn failed) */
  started: boolean;
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /**
   * Error reported by spawnSync: a resolution or spawn failure when `started`
   * is false, otherwise the child was stopped (e.g. ENOBUFS past maxBuffer)
   */
  error?: Error;
}

/**
 * Determine if shell should be used for command execution on Windows
 *
 * Windows needs a shell for `node` and for .cmd/.bat/.ps1 launchers.
 * Paths are resolved by which.sync() before we get here.
 *
 * @param command - Command name (e.g., 'node', 'python3')
 * @param commandPath - Resolved absolute path to command
 * @returns true if shell should be used, false otherwise
 */
function shouldUseShell(command: string, commandPath: string): boolean {
  if (process.platform !== 'win32') {
    return false;
  }

  if (command === 'node') {
    return true;
  }

  const lowerPath = commandPath.toLowerCase();
  return lowerPath.endsWith('.cmd') || lowerPath.endsWith('.bat') || lowerPath.endsWith('.ps1');
}

/**
 * Safe command execution that returns a detailed result (never throws)
 *
 * Resolves the command with `which` and runs it through spawnSync with
 * shell: false, so arguments are never interpreted by a shell. Both
 * streams are captured as UTF-8 strings.
 *
 * A command that cannot be found or spawned comes back with `started: false`
 * and `error` set, so callers can tell "never ran" apart from "ran and failed".
 *
 * @example
 * const result = safeExecResult('python3', ['-m', 'build', '--wheel'], { cwd: projectDir });
 * if (result.status !== 0) {
 *   console.error(result.error?.message ?? result.stderr);
 * }
 */
export function safeExecResult(
  command: string,
  args: string[] = [],
  options: SafeExecOptions = {},
): SafeExecResult {
  try {
    // which.sync throws if the command is not on PATH (or the path does not exist)
    const commandPath = which.sync(command);
    const useShell = shouldUseShell(command, commandPath);

    const spawnOptions: SpawnSyncOptions = {
      shell: useShell,
      stdio: ['ignore', 'pipe', 'pipe'],
      env: options.env,
      cwd: options.cwd,
      maxBuffer: options.maxBuffer ?? DEFAULT_MAX_BUFFER,
      encoding: 'utf8',
    };

    // When shell:true, use command name so shell can resolve it properly
    const execCommand = useShell ? command : commandPath;
    const result = spawnSync(execCommand, args, spawnOptions);

    return {
      status: result.status ?? -1,
      started: result.pid > 0 || result.status !== null || result.signal !== null,
      stdout: toText(result.stdout),
      stderr: toText(result.stderr),
      error: result.error,
    };
  } catch (error) {
    return {
      status: -1,
      started: false,
      stdout: '',
      stderr: '',
      error: error instanceof Error ? error : new Error(String(error)),
    };
  }
}

function toText(output: string | Buffer | null | undefined): string {
  if (output === null || output === undefined) {
    return '';
  }
  return typeof output === 'string' ? output : output.toString('utf8');
}
