/**
 * Common types and interfaces for the deptree CLI
 */

export type { ExecutionContext } from './execution-context.js';

export interface DeptreeDirectories {
  config: string;
}

/**
 * Shape of ~/.deptree/config.jsonc. Every key is optional; missing keys fall
 * back to the built-in defaults.
 */
export interface DeptreeConfig {
  registryUrl?: string;
  userAgent?: string;
  maxDepth?: number;
  testGraphFile?: string;
}

export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
}

// Error types
export class DeptreeError extends Error {
  public code: ErrorCodes;
  public details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCodes, details?: Record<string, unknown>) {
    super(message);
    this.name = 'DeptreeError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  ROOT_NOT_FOUND = 'ROOT_NOT_FOUND',
  GRAPH_SOURCE_ERROR = 'GRAPH_SOURCE_ERROR',
  MANIFEST_PARSE_ERROR = 'MANIFEST_PARSE_ERROR',
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
