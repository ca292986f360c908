/**
 * CLI-specific error handling wrapper for Commander.js actions.
 *
 * This belongs in the CLI package (not core) because it calls
 * process.exit() and writes directly to stderr -- both are
 * terminal/process-level concerns that core should not own.
 */

import { handleError, CycleInconsistencyError, logger } from '@automark/core';

/**
 * Wraps an async function with error handling for Commander.js actions.
 * Catches errors, formats them, and exits the process with status 1.
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      // Detection disagrees with the package database: always loud
      if (error instanceof CycleInconsistencyError) {
        logger.error('Fatal inconsistency in cycle detection', { packages: error.packages });
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
