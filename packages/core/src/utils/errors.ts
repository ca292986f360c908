import { AutomarkError, ErrorCodes, CommandResult, PackageName } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the different failure kinds automark reports
 */

export class FileSystemError extends AutomarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends AutomarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends AutomarkError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Raised when packages reported as cyclic are not pending removal according
 * to an independent re-check. The detection disagrees with the package
 * database; this is never corrected silently.
 */
export class CycleInconsistencyError extends AutomarkError {
  public readonly packages: PackageName[];

  constructor(packages: PackageName[]) {
    super(
      `Inconsistent cycle detection: ${packages.join(', ')} reported as cyclic but not pending removal`,
      ErrorCodes.CYCLE_INCONSISTENCY,
      { packages }
    );
    this.name = 'CycleInconsistencyError';
    this.packages = packages;
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof AutomarkError) {
    // Details only surface in verbose mode
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}
