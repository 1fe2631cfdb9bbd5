/**
 * CLI exit codes
 *
 * @module cli/lib/exit-codes
 */

export const EXIT_CODES = {
  SUCCESS: 0,
  ERRORS: 1,
  UNRESOLVED: 2,
  CONFIG_ERROR: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];
