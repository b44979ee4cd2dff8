/**
 * Workspace effects
 *
 * The narrow filesystem surface the orchestrator depends on. The Node
 * implementation talks to the real disk; tests use MemoryWorkspaceEffects.
 */

import { mkdirSync, readdirSync, rmSync, statSync } from 'node:fs';
import { join } from 'node:path';

/**
 * A regular file directly inside a directory
 */
export interface FileEntry {
  name: string;
  sizeBytes: number;
}

/**
 * Filesystem operations used by the locator, filter, isolator and aggregator
 *
 * Query methods return false for missing paths and throw for anything else
 * (permission denied, I/O errors).
 */
export interface WorkspaceEffects {
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  isFile(path: string): boolean;

  /** Create a directory and its parents (no-op if it already exists) */
  ensureDirectory(path: string): void;

  /** Recursively delete a file or directory (no-op if missing) */
  removeTree(path: string): void;

  /** Regular files directly inside `path` */
  listFiles(path: string): FileEntry[];

  /** Names of all entries directly inside `path` (empty if it is missing) */
  listEntries(path: string): string[];
}

function statOrUndefined(path: string) {
  return statSync(path, { throwIfNoEntry: false });
}

/**
 * Ensure a directory exists (create if needed)
 *
 * Ignores EEXIST errors if the directory already exists.
 *
 * @throws Error if directory creation fails for reasons other than already existing
 */
export function ensureDir(dirPath: string): void {
  try {
    mkdirSync(dirPath, { recursive: true });
  } catch (err: unknown) {
    if (err && typeof err === 'object' && 'code' in err && err.code === 'EEXIST' && statOrUndefined(dirPath)?.isDirectory()) {
      return;
    }
    throw err;
  }
}

/**
 * WorkspaceEffects backed by node:fs
 */
export const nodeWorkspaceEffects: WorkspaceEffects = {
  exists(path) {
    return statOrUndefined(path) !== undefined;
  },

  isDirectory(path) {
    return statOrUndefined(path)?.isDirectory() ?? false;
  },

  isFile(path) {
    return statOrUndefined(path)?.isFile() ?? false;
  },

  ensureDirectory(path) {
    ensureDir(path);
  },

  removeTree(path) {
    rmSync(path, { recursive: true, force: true });
  },

  listFiles(path) {
    return readdirSync(path, { withFileTypes: true })
      .filter(dirent => dirent.isFile())
      .map(dirent => ({
        name: dirent.name,
        sizeBytes: statSync(join(path, dirent.name)).size,
      }));
  },

  listEntries(path) {
    return statOrUndefined(path)?.isDirectory() ? readdirSync(path) : [];
  },
};
