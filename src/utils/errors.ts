import { DataDepError, ErrorCodes, type CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for every terminal outcome of a resolution
 */

export class DownloadsDisabledError extends DataDepError {
  constructor(name: string, variable: string = 'DATADEPS_DISABLE_DOWNLOAD') {
    super(
      `${variable} environment variable set. Can not trigger download of '${name}'.`,
      ErrorCodes.DOWNLOADS_DISABLED,
      { name }
    );
    this.name = 'DownloadsDisabledError';
  }
}

export class UnknownDependencyError extends DataDepError {
  constructor(name: string) {
    super(`Data dependency '${name}' is not registered`, ErrorCodes.UNKNOWN_DEPENDENCY, { name });
    this.name = 'UnknownDependencyError';
  }
}

export class TermsDeniedError extends DataDepError {
  constructor(name: string) {
    super(
      `User declined to download ${name}. Can not proceed without the data.`,
      ErrorCodes.TERMS_DENIED,
      { name }
    );
    this.name = 'TermsDeniedError';
  }
}

export class ChecksumAbortedError extends DataDepError {
  constructor(name: string, paths: string[]) {
    super(
      `Hash failed for data dependency '${name}', user elected not to retry.`,
      ErrorCodes.CHECKSUM_ABORTED,
      { name, paths }
    );
    this.name = 'ChecksumAbortedError';
  }
}

export class ResolutionAbortedError extends DataDepError {
  constructor(name: string, filePath: string) {
    super(
      `Aborted resolving data dependency '${name}', program could not continue.`,
      ErrorCodes.RESOLUTION_ABORTED,
      { name, filePath }
    );
    this.name = 'ResolutionAbortedError';
  }
}

export class InvalidDataDepError extends DataDepError {
  constructor(reason: string, details?: unknown) {
    super(`Invalid data dependency: ${reason}`, ErrorCodes.INVALID_DATADEP, details);
    this.name = 'InvalidDataDepError';
  }
}

export class FileSystemError extends DataDepError {
  constructor(message: string, details?: unknown) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ValidationError extends DataDepError {
  constructor(message: string, details?: unknown) {
    super(`Validation error: ${message}`, ErrorCodes.VALIDATION_ERROR, details);
    this.name = 'ValidationError';
  }
}

export class ConfigError extends DataDepError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

export class UserCancellationError extends Error {
  constructor(message: string = 'Operation cancelled by user') {
    super(message);
    this.name = 'UserCancellationError';
  }
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof DataDepError) {
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
      // Cancelled prompts exit quietly
      if (error instanceof UserCancellationError) {
        process.exit(0);
      }

      const result = handleError(error);
      console.error(result.error);
      process.exit(1);
    }
  };
}
