/**
 * Shared configuration error reporting utility
 *
 * Consistent formatting of config validation errors across commands.
 */

import chalk, { type ChalkInstance } from 'chalk';

export interface ConfigErrorDetails {
  fileName: string;
  errors: string[];
}

/**
 * Format configuration validation errors for display
 *
 * @param details Error details from config validation
 * @param maxErrors Maximum number of errors to show (default: 5)
 * @returns Formatted error messages as string array
 */
export function formatConfigErrors(
  details: ConfigErrorDetails,
  maxErrors: number = 5,
  colors: ChalkInstance = chalk
): string[] {
  const messages: string[] = [];

  messages.push(colors.yellow('Validation errors:'));

  const errorList = details.errors.slice(0, maxErrors);
  for (const err of errorList) {
    messages.push(colors.gray(`  • ${err}`));
  }

  if (details.errors.length > maxErrors) {
    messages.push(colors.gray(`  ... and ${details.errors.length - maxErrors} more`));
  }

  return messages;
}

/**
 * Format helpful suggestions for fixing configuration errors
 */
export function formatConfigSuggestions(colors: ChalkInstance = chalk): string[] {
  return [
    colors.blue('💡 Suggestions:'),
    colors.gray('  • Check YAML syntax (indentation, colons, quotes)'),
    colors.gray('  • Project names are plain directory names under workspace.sourcesDir'),
    colors.gray('  • Paths in workspace and cleanup are relative and may not contain ".."'),
    colors.gray('  • Run `wheelhouse list` to see how the workspace resolves'),
  ];
}

/**
 * Display configuration validation errors with suggestions
 *
 * Prints formatted error messages and helpful suggestions to stderr.
 */
export function displayConfigErrors(
  details: ConfigErrorDetails,
  maxErrors: number = 5,
  colors: ChalkInstance = chalk
): void {
  console.error(colors.red(`❌ Configuration is invalid: ${details.fileName}`));
  console.error();

  for (const msg of formatConfigErrors(details, maxErrors, colors)) console.error(msg);

  console.error();

  for (const msg of formatConfigSuggestions(colors)) console.error(msg);
}
