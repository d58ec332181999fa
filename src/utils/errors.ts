import { ModpinError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Custom error classes for the failure kinds the engine distinguishes
 */

export class NoSourceError extends ModpinError {
  constructor(name: string, dir?: string) {
    super(`No buildable source for '${name}'${dir ? ` in ${dir}` : ''}`, ErrorCodes.NO_SOURCE, { name, dir });
    this.name = 'NoSourceError';
  }
}

export class BackendResolutionError extends ModpinError {
  constructor(moduleName: string, reason: string) {
    super(`Could not resolve repo for ${moduleName}: ${reason}`, ErrorCodes.BACKEND_RESOLUTION, { moduleName, reason });
    this.name = 'BackendResolutionError';
  }
}

export class VcsCommandError extends ModpinError {
  constructor(command: string, args: string[], stderr: string) {
    super(`${command} ${args.join(' ')} failed: ${stderr}`, ErrorCodes.VCS_COMMAND, { command, args });
    this.name = 'VcsCommandError';
  }
}

export class ManifestWriteError extends ModpinError {
  constructor(manifestPath: string, cause: unknown) {
    super(
      `Failed to write manifest ${manifestPath}: ${cause instanceof Error ? cause.message : String(cause)}`,
      ErrorCodes.MANIFEST_WRITE,
      { manifestPath }
    );
    this.name = 'ManifestWriteError';
  }
}

export class FileSystemError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
  }
}

export class ValidationError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
  }
}

export class ConfigError extends ModpinError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof ModpinError) {
    // For CLI UX, avoid noisy error logs by default; surface details only in verbose mode
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
