/**
 * Error taxonomy for migrations
 *
 * Config and connection errors end a migration. Query errors end it after
 * one page retry. Transform and write errors are isolated to a row or batch
 * and only ever surface in the report.
 */

import type { ErrorStage } from '../types/index.js';

export type ConfigErrorCode =
  | 'BROKEN_JOIN_GRAPH'
  | 'DUPLICATE_JOIN_TARGET'
  | 'UNKNOWN_TRANSFORM'
  | 'INVALID_COLUMN_REFERENCE'
  | 'UNSUPPORTED_JOIN_TYPE'
  | 'INVALID_IDENTIFIER'
  | 'INVALID_OPTIONS';

export type MigrationErrorCode =
  | ConfigErrorCode
  | 'CONNECTION_FAILED'
  | 'QUERY_FAILED'
  | 'TRANSFORM_FAILED'
  | 'UNEXPECTED_COLUMN'
  | 'WRITE_FAILED'
  | 'FAILURE_THRESHOLD_EXCEEDED'
  | 'UNKNOWN';

export interface MigrationErrorDetails<TCode extends MigrationErrorCode = MigrationErrorCode> {
  /** Error code for programmatic handling */
  code: TCode;
  /** Human-readable message */
  message: string;
  /** Migration the error belongs to */
  migration?: string;
  /** Suggested action to resolve */
  suggestion?: string;
  /** Original error (if wrapping) */
  cause?: unknown;
  /** Additional context */
  context?: Record<string, unknown>;
}

export class MigrationError extends Error {
  readonly code: MigrationErrorCode;
  readonly stage: ErrorStage;
  readonly migration?: string;
  readonly suggestion?: string;
  readonly context?: Record<string, unknown>;

  constructor(stage: ErrorStage, details: MigrationErrorDetails) {
    super(details.message);
    this.name = 'MigrationError';
    this.stage = stage;
    this.code = details.code;
    this.migration = details.migration;
    this.suggestion = details.suggestion;
    this.context = details.context;

    if (details.cause !== undefined) {
      this.cause = details.cause;
    }
  }

  /**
   * Structured, actionable message for operators
   */
  toActionableMessage(): string {
    const parts = [`Error [${this.code}]: ${this.message}`];

    if (this.migration) {
      parts.push(`Migration: ${this.migration}`);
    }

    if (this.suggestion) {
      parts.push(`Suggested action: ${this.suggestion}`);
    }

    return parts.join('\n');
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      stage: this.stage,
      code: this.code,
      message: this.message,
      migration: this.migration,
      suggestion: this.suggestion,
      context: this.context,
    };
  }
}

/** Invalid declaration; detected before any row moves */
export class ConfigError extends MigrationError {
  declare readonly code: ConfigErrorCode;

  constructor(details: MigrationErrorDetails<ConfigErrorCode>) {
    super('config', details);
    this.name = 'ConfigError';
  }
}

/** The connection itself is unusable */
export class ConnectionError extends MigrationError {
  constructor(details: Omit<MigrationErrorDetails, 'code'> & { code?: MigrationErrorCode }) {
    super('connection', { ...details, code: details.code ?? 'CONNECTION_FAILED' });
    this.name = 'ConnectionError';
  }
}

/** A source read failed */
export class QueryError extends MigrationError {
  constructor(details: Omit<MigrationErrorDetails, 'code'> & { code?: MigrationErrorCode }) {
    super('query', { ...details, code: details.code ?? 'QUERY_FAILED' });
    this.name = 'QueryError';
  }
}

/** A single row could not be transformed */
export class TransformError extends MigrationError {
  constructor(details: Omit<MigrationErrorDetails, 'code'> & { code?: MigrationErrorCode }) {
    super('transform', { ...details, code: details.code ?? 'TRANSFORM_FAILED' });
    this.name = 'TransformError';
  }
}

/** A batch could not be committed */
export class WriteError extends MigrationError {
  constructor(details: Omit<MigrationErrorDetails, 'code'> & { code?: MigrationErrorCode }) {
    super('write', { ...details, code: details.code ?? 'WRITE_FAILED' });
    this.name = 'WriteError';
  }
}

/**
 * Helper to wrap unknown errors as a MigrationError of the given stage
 */
export function wrapError(
  error: unknown,
  stage: Exclude<ErrorStage, 'config' | 'threshold'>,
  migration?: string
): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const details = { message, migration, cause: error };

  switch (stage) {
    case 'connection':
      return new ConnectionError(details);
    case 'query':
      return new QueryError(details);
    case 'transform':
      return new TransformError(details);
    case 'write':
      return new WriteError(details);
  }
}

/**
 * Human-readable message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
