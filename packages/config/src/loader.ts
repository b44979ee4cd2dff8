/**
 * Configuration Loader
 *
 * Loads and resolves wheelhouse configuration from YAML files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';

import { parse as parseYaml } from 'yaml';

import { getDefaultConfig, safeValidateConfig, type ResolvedWheelhouseConfig } from './schema.js';

/**
 * Configuration file name
 *
 * Only YAML format is supported.
 */
export const CONFIG_FILE_NAME = 'wheelhouse.config.yaml';

/**
 * Error thrown when a configuration file cannot be read, parsed or validated
 */
export class ConfigLoadError extends Error {
  public readonly configPath: string;
  public readonly errors: string[];

  constructor(configPath: string, errors: string[]) {
    super(`Invalid configuration in ${configPath}: ${errors.join('; ')}`);
    this.name = 'ConfigLoadError';
    this.configPath = configPath;
    this.errors = errors;
  }
}

/**
 * Loaded configuration together with where it came from
 */
export interface LoadedConfig {
  config: ResolvedWheelhouseConfig;
  /** Path of the config file, or where it would be when defaults are used */
  configPath: string;
  /** False when no config file exists and defaults were applied */
  fromFile: boolean;
}

/**
 * Load configuration from a file path
 *
 * @param configPath - Path to config file (must be .yaml)
 * @returns Loaded and validated configuration
 * @throws ConfigLoadError if the file cannot be loaded or is invalid
 */
export async function loadConfigFromFile(
  configPath: string
): Promise<ResolvedWheelhouseConfig> {
  const absolutePath = resolve(configPath);

  if (!absolutePath.endsWith('.yaml')) {
    throw new ConfigLoadError(absolutePath, [
      `Unsupported config file format (only .yaml is supported, use ${CONFIG_FILE_NAME})`,
    ]);
  }

  let raw: unknown;
  try {
    raw = parseYaml(readFileSync(absolutePath, 'utf-8'));
  } catch (error) {
    throw new ConfigLoadError(absolutePath, [error instanceof Error ? error.message : String(error)]);
  }

  // An empty file means "all defaults"
  if (raw === null || raw === undefined) {
    raw = {};
  }

  if (raw === null || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigLoadError(absolutePath, ['Configuration must be an object']);
  }

  // Remove $schema property if present (used for IDE support only)
  const rest = Object.fromEntries(Object.entries(raw).filter(([key]) => key !== '$schema'));

  const result = safeValidateConfig(rest);
  if (!result.success) {
    throw new ConfigLoadError(absolutePath, result.errors);
  }
  return result.data;
}

/**
 * Find the nearest config file, walking up from `cwd` to the filesystem root
 *
 * @returns Absolute path to the config file, or undefined if none exists
 */
export function findConfigFile(cwd: string = process.cwd()): string | undefined {
  let current = resolve(cwd);

  for (;;) {
    const candidate = join(current, CONFIG_FILE_NAME);
    if (existsSync(candidate)) {
      return candidate;
    }

    const parent = dirname(current);
    if (parent === current) {
      return undefined;
    }
    current = parent;
  }
}

/**
 * Load the workspace configuration
 *
 * Uses `explicitPath` when given, otherwise the nearest config file above
 * `cwd`. Without any config file, defaults apply and the config path is
 * reported as `<cwd>/wheelhouse.config.yaml`.
 *
 * @throws ConfigLoadError if a config file exists but is invalid, or the explicit path is missing
 */
export async function loadWorkspaceConfig(
  cwd: string = process.cwd(),
  explicitPath?: string
): Promise<LoadedConfig> {
  if (explicitPath !== undefined) {
    const configPath = resolve(cwd, explicitPath);
    if (!existsSync(configPath)) {
      throw new ConfigLoadError(configPath, ['Config file not found']);
    }
    return { config: await loadConfigFromFile(configPath), configPath, fromFile: true };
  }

  const found = findConfigFile(cwd);
  if (found === undefined) {
    return {
      config: getDefaultConfig(),
      configPath: join(resolve(cwd), CONFIG_FILE_NAME),
      fromFile: false,
    };
  }

  return { config: await loadConfigFromFile(found), configPath: found, fromFile: true };
}
