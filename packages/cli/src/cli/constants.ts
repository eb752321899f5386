/**
 * CLI constants
 */

export const VERSION = "0.3.0";

/**
 * Process exit codes
 */
export const EXIT_CODES = {
  ok: 0,
  failure: 1,
  unknownCommand: 2,
  noConfig: 3,
  load: 4,
  generate: 5,
  write: 6,
} as const;
