/**
 * Common types and interfaces for the modpin CLI application
 */

// Result envelope returned by every command
export interface CommandResult<T = unknown> {
  success: boolean;
  data?: T;
  error?: string;
  warnings?: string[];
}

/**
 * Immutable process-wide settings, threaded through constructors.
 */
export interface EngineConfig {
  /** Directory of the root module (the current workspace) */
  readonly cwd: string;
  /** Shared workspace; modules live under `<workspaceRoot>/src/<name>` */
  readonly workspaceRoot: string;
  /** Where dependency checkouts are materialized (`<cwd>/vendor` by default) */
  readonly installRoot: string;
  /** Recursive import discovery only happens with vendoring enabled */
  readonly vendoring: boolean;
}

/**
 * Unit metadata as returned by an import extractor.
 */
export interface ModuleMeta {
  /** Absolute directory holding the unit's sources */
  dir: string;
  /** Canonical import path of the unit */
  importPath: string;
  /** Direct, non-relative imports, sorted and unique */
  imports: string[];
}

/**
 * Locates a unit by name and lists its direct imports.
 * Throws NoSourceError when the directory holds no buildable source.
 */
export interface ImportExtractor {
  extract(name: string, cwd: string): Promise<ModuleMeta>;
}

export type BuiltinClassifier = (importPath: string) => boolean;

// Error types
export class ModpinError extends Error {
  public code: string;
  public details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ModpinError';
    this.code = code;
    this.details = details;
  }
}

export enum ErrorCodes {
  NO_SOURCE = 'NO_SOURCE',
  BACKEND_RESOLUTION = 'BACKEND_RESOLUTION',
  VCS_COMMAND = 'VCS_COMMAND',
  MANIFEST_WRITE = 'MANIFEST_WRITE',
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
