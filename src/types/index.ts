/**
 * Common types and interfaces for datadep
 */

export * from './datadep.js';
export * from './execution-context.js';

// Configuration types
export interface DataDepsConfig {
  /** Skip the terms-of-use prompt for every download */
  alwaysAccept: boolean;
  /** Refuse every download, whatever the terms decision */
  disableDownload: boolean;
  /** Directories searched for existing copies, in priority order */
  loadPath: string[];
}

// Command result and error types
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

export class DataDepError extends Error {
  public code: ErrorCodes;
  public details?: unknown;

  constructor(message: string, code: ErrorCodes, details?: unknown) {
    super(message);
    this.name = 'DataDepError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  DOWNLOADS_DISABLED = 'DOWNLOADS_DISABLED',
  UNKNOWN_DEPENDENCY = 'UNKNOWN_DEPENDENCY',
  TERMS_DENIED = 'TERMS_DENIED',
  CHECKSUM_ABORTED = 'CHECKSUM_ABORTED',
  RESOLUTION_ABORTED = 'RESOLUTION_ABORTED',
  INVALID_DATADEP = 'INVALID_DATADEP',
  FILE_SYSTEM_ERROR = 'FILE_SYSTEM_ERROR',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  CONFIG_ERROR = 'CONFIG_ERROR'
}

// Logger types
export enum LogLevel {
  DEBUG = 'debug',
  INFO = 'info',
  WARN = 'warn',
  ERROR = 'error'
}

export interface Logger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}
