/**
 * In-memory WorkspaceEffects
 *
 * A tiny POSIX-style tree for exercising the orchestrator without touching
 * the disk. Paths are absolute and '/'-separated.
 *
 * @example
 * ```typescript
 * const fs = new MemoryWorkspaceEffects();
 * fs.addFile('/ws/clients/python/core/pyproject.toml');
 * fs.addDirectory('/ws/clients/python/core/build');
 * ```
 */

import { posix } from 'node:path';

import type { FileEntry, WorkspaceEffects } from './workspace-effects.js';

export class MemoryWorkspaceEffects implements WorkspaceEffects {
  private readonly directories = new Set<string>(['/']);
  private readonly files = new Map<string, number>();

  /** Paths passed to removeTree(), in call order */
  public readonly removals: string[] = [];

  /** Paths whose removal throws (simulates EACCES) */
  public readonly failRemovalFor = new Set<string>();

  /** Paths whose creation throws (simulates a read-only filesystem) */
  public readonly failEnsureFor = new Set<string>();

  addDirectory(path: string): this {
    let current = posix.resolve(path);
    while (!this.directories.has(current)) {
      this.directories.add(current);
      current = posix.dirname(current);
    }
    return this;
  }

  addFile(path: string, sizeBytes = 0): this {
    const resolved = posix.resolve(path);
    this.addDirectory(posix.dirname(resolved));
    this.files.set(resolved, sizeBytes);
    return this;
  }

  /** Every file and directory below `root`, sorted */
  listTree(root = '/'): string[] {
    const base = posix.resolve(root);
    return [...this.directories, ...this.files.keys()]
      .filter(path => path !== base && isBelow(base, path))
      .sort((a, b) => a.localeCompare(b));
  }

  exists(path: string): boolean {
    const resolved = posix.resolve(path);
    return this.directories.has(resolved) || this.files.has(resolved);
  }

  isDirectory(path: string): boolean {
    return this.directories.has(posix.resolve(path));
  }

  isFile(path: string): boolean {
    return this.files.has(posix.resolve(path));
  }

  ensureDirectory(path: string): void {
    const resolved = posix.resolve(path);
    if (this.failEnsureFor.has(resolved)) {
      throw new Error(`EROFS: read-only file system, mkdir '${resolved}'`);
    }
    if (this.files.has(resolved)) {
      throw new Error(`EEXIST: file already exists, mkdir '${resolved}'`);
    }
    this.addDirectory(resolved);
  }

  removeTree(path: string): void {
    const resolved = posix.resolve(path);
    this.removals.push(resolved);
    if (this.failRemovalFor.has(resolved)) {
      throw new Error(`EACCES: permission denied, rm '${resolved}'`);
    }

    this.files.delete(resolved);
    this.directories.delete(resolved);
    for (const file of [...this.files.keys()]) {
      if (isBelow(resolved, file)) {
        this.files.delete(file);
      }
    }
    for (const dir of [...this.directories]) {
      if (isBelow(resolved, dir)) {
        this.directories.delete(dir);
      }
    }
  }

  listFiles(path: string): FileEntry[] {
    const resolved = posix.resolve(path);
    if (!this.directories.has(resolved)) {
      throw new Error(`ENOENT: no such file or directory, scandir '${resolved}'`);
    }
    const entries: FileEntry[] = [];
    for (const [file, sizeBytes] of this.files) {
      if (posix.dirname(file) === resolved) {
        entries.push({ name: posix.basename(file), sizeBytes });
      }
    }
    return entries;
  }

  listEntries(path: string): string[] {
    const resolved = posix.resolve(path);
    if (!this.directories.has(resolved)) {
      return [];
    }
    return [...this.directories, ...this.files.keys()]
      .filter(entry => entry !== resolved && posix.dirname(entry) === resolved)
      .map(entry => posix.basename(entry));
  }
}

function isBelow(parent: string, child: string): boolean {
  return parent === '/' ? child.startsWith('/') : child.startsWith(`${parent}/`);
}
