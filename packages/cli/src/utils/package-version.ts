/**
 * Package version lookup
 *
 * Reads the version from the nearest package.json above a directory, so it
 * works from src/ as well as from compiled output.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';

import { z } from 'zod';

const PackageJsonSchema = z.object({
  version: z.string().min(1),
});

/**
 * Find the version of the nearest package.json at or above `startDir`
 *
 * @returns The version, or undefined when no readable package.json with a version exists
 */
export function readPackageVersion(startDir: string): string | undefined {
  let current = startDir;

  for (;;) {
    const candidate = join(current, 'package.json');
    if (existsSync(candidate)) {
      const parsed = PackageJsonSchema.safeParse(JSON.parse(readFileSync(candidate, 'utf-8')));
      if (parsed.success) {
        return parsed.data.version;
      }
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}
