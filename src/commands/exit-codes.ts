/**
 * CLI exit codes.
 */
export const EXIT = {
  SUCCESS: 0,
  /** The run finished but did not succeed, or validation found errors. */
  FAILED: 1,
  INVALID_ARGS: 3,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];
