/**
 * YAML Output Utilities
 *
 * Writes a result as a standalone YAML document on stdout, so `--yaml`
 * output can be piped while the human report goes to stderr.
 *
 * @package @wheelhouse/cli
 */

import { stringify as stringifyYaml } from 'yaml';

/**
 * Output a result as YAML to stdout
 *
 * Waits briefly so stderr is flushed first, frames the document with `---`
 * separators and resolves once stdout has drained.
 *
 * @example
 * ```typescript
 * const result = runBuild({ config, entryPoint });
 * await outputYamlResult(result);
 * ```
 */
export async function outputYamlResult(result: unknown): Promise<void> {
  // Small delay to ensure stderr is flushed
  await new Promise(resolve => setTimeout(resolve, 10));

  process.stdout.write('---\n');

  const yaml = stringifyYaml(result);
  process.stdout.write(yaml);

  if (!yaml.endsWith('\n')) {
    process.stdout.write('\n');
  }
  process.stdout.write('---\n');

  await new Promise<void>(resolve => {
    if (process.stdout.write('')) {
      resolve();
    } else {
      process.stdout.once('drain', resolve);
    }
  });
}
