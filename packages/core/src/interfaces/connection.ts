/**
 * Database Connection Interface
 *
 * The engine only ever issues parameterized SELECTs, parameterized
 * multi-row INSERTs and BEGIN/COMMIT/ROLLBACK through this surface.
 * Connection lifecycle belongs to whoever created the connection.
 */

import type { JoinType, WriteMode } from '../types/index.js';

export type DialectName = 'postgresql' | 'mysql' | 'sqlite';

/** Positional result of a read query */
export interface QueryResult {
  /**
   * Column labels in result order. Empty when the driver is name-blind,
   * in which case rows are aligned by position only.
   */
  fields: string[];
  rows: unknown[][];
}

export interface Transaction {
  /**
   * Execute a write statement inside the transaction
   * @returns affected row count
   */
  execute(sql: string, params?: unknown[]): Promise<number>;
  commit(): Promise<void>;
  rollback(): Promise<void>;
}

/** Read-only session whose queries all see one point-in-time view */
export interface ReadSnapshot {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
  /** End the snapshot and hand its session back */
  close(): Promise<void>;
}

export interface InsertStatementOptions {
  mode?: WriteMode;
  /** Required for upserts */
  conflictColumns?: string[];
}

/** SQL syntax differences the engine has to care about */
export interface SqlDialect {
  readonly name: DialectName;
  /** Join types this engine can execute */
  readonly joinTypes: ReadonlySet<JoinType>;
  /** Most bind parameters one statement may carry */
  readonly maxParameters: number;
  quoteIdentifier(identifier: string): string;
  /** Placeholder for the 1-based parameter index */
  placeholder(index: number): string;
  /** LIMIT/OFFSET tail */
  limitClause(limit: number, offset?: number): string;
  /**
   * Multi-row insert for `rowCount` rows of `columns`.
   * Parameters are expected row-major.
   */
  insertStatement(
    table: string,
    columns: readonly string[],
    rowCount: number,
    options?: InsertStatementOptions
  ): string;
}

export interface DatabaseConnection {
  readonly dialect: SqlDialect;

  /**
   * Run a parameterized read query
   * @throws ConnectionError when the connection itself failed
   * @throws QueryError for any other failure
   */
  query(sql: string, params?: unknown[]): Promise<QueryResult>;

  /**
   * Open a transaction on a dedicated session
   * @throws ConnectionError if no session can be obtained
   */
  begin(): Promise<Transaction>;

  /**
   * Open a snapshot for a multi-page read. Without one, every page is read
   * independently and may see rows committed between pages.
   * @throws ConnectionError if no session can be obtained
   */
  snapshot?(): Promise<ReadSnapshot>;
}

/** A connection whose lifecycle the caller manages */
export interface ManagedConnection extends DatabaseConnection {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  /**
   * Run `SELECT 1`
   * @returns true if the connection is healthy
   */
  testConnection(): Promise<boolean>;
}
