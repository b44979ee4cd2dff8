/**
 * Process exit codes shared by all commands
 */
export const EXIT_CODES = {
  /** Every eligible sub-project built (or nothing was eligible) */
  PASSED: 0,
  /** At least one sub-project failed */
  FAILED: 1,
  /** Invalid configuration or unusable workspace; nothing was reported */
  FATAL: 2,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
