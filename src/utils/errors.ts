import { DeptreeError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for the deptree CLI
 */

export class RootNotFoundError extends DeptreeError {
  constructor(packageName: string) {
    super(`Package '${packageName}' not found in the dependency graph`, ErrorCodes.ROOT_NOT_FOUND, { packageName });
    this.name = 'RootNotFoundError';
  }
}

/**
 * The graph source as a whole could not be loaded (unreadable edge-list file,
 * unreachable manifest). Per-package registry failures never raise this.
 */
export class GraphSourceError extends DeptreeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Failed to load dependency graph: ${message}`, ErrorCodes.GRAPH_SOURCE_ERROR, details);
    this.name = 'GraphSourceError';
  }
}

export class ManifestParseError extends DeptreeError {
  constructor(reason: string, details?: Record<string, unknown>) {
    super(`Invalid manifest: ${reason}`, ErrorCodes.MANIFEST_PARSE_ERROR, details);
    this.name = 'ManifestParseError';
  }
}

export class FileSystemError extends DeptreeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends DeptreeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends DeptreeError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Error handler that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DeptreeError) {
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

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
