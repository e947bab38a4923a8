/**
 * SQLite Connection
 *
 * DatabaseConnection over a single better-sqlite3 handle. The driver is
 * synchronous; one transaction may be open at a time.
 */

import Database from 'better-sqlite3';
import {
  dialectFor,
  type ManagedConnection,
  type QueryResult,
  type SqlDialect,
  type Transaction,
} from '@rowshift/core';
import { classifyDriverError, connectionFailed } from '../errors.js';

export interface SqliteConnectionConfig {
  /** Database file (default: in-memory) */
  path?: string;
  readonly?: boolean;
}

/** better-sqlite3 binds numbers, strings, bigints, buffers and null only */
function toSqliteParam(value: unknown): unknown {
  if (value === undefined) return null;
  if (typeof value === 'boolean') return value ? 1 : 0;
  if (value instanceof Date) return value.toISOString();
  return value;
}

class SqliteTransaction implements Transaction {
  private done = false;

  constructor(private readonly db: Database.Database) {}

  async execute(sql: string, params: unknown[] = []): Promise<number> {
    try {
      return this.db.prepare(sql).run(...params.map(toSqliteParam)).changes;
    } catch (error) {
      throw classifyDriverError(error, 'write', 'SQLite');
    }
  }

  async commit(): Promise<void> {
    this.finish('COMMIT');
  }

  async rollback(): Promise<void> {
    this.finish('ROLLBACK');
  }

  private finish(statement: 'COMMIT' | 'ROLLBACK'): void {
    if (this.done) return;
    this.done = true;

    try {
      this.db.exec(statement);
    } catch (error) {
      throw classifyDriverError(error, 'write', 'SQLite');
    }
  }
}

export class SqliteConnection implements ManagedConnection {
  readonly dialect: SqlDialect = dialectFor('sqlite');
  private db: Database.Database | null = null;

  constructor(private readonly config: SqliteConnectionConfig = {}) {}

  /**
   * Open the database file (or an in-memory database)
   */
  async connect(): Promise<void> {
    if (this.db) return;
    try {
      this.db = new Database(this.config.path ?? ':memory:', {
        readonly: this.config.readonly ?? false,
        fileMustExist: this.config.readonly ?? false,
      });
    } catch (error) {
      throw connectionFailed(error, 'SQLite');
    }
  }

  async disconnect(): Promise<void> {
    this.db?.close();
    this.db = null;
  }

  async testConnection(): Promise<boolean> {
    try {
      this.handle().prepare('SELECT 1').get();
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Run DDL or seed statements outside the migration surface
   */
  exec(sql: string): void {
    this.handle().exec(sql);
  }

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    const db = this.handle();
    try {
      const statement = db.prepare(sql);
      if (!statement.reader) {
        statement.run(...params.map(toSqliteParam));
        return { fields: [], rows: [] };
      }

      statement.raw(true);
      const fields = statement.columns().map((column) => column.name);
      const rows: unknown[][] = [];
      for (const row of statement.all(...params.map(toSqliteParam))) {
        if (Array.isArray(row)) rows.push(row);
      }
      return { fields, rows };
    } catch (error) {
      throw classifyDriverError(error, 'query', 'SQLite');
    }
  }

  async begin(): Promise<Transaction> {
    const db = this.handle();
    try {
      db.exec('BEGIN');
    } catch (error) {
      throw classifyDriverError(error, 'write', 'SQLite');
    }
    return new SqliteTransaction(db);
  }

  private handle(): Database.Database {
    if (!this.db) {
      throw connectionFailed(new Error('Connection is not open'), 'SQLite');
    }
    return this.db;
  }
}

/**
 * Factory function to create a SQLite connection
 */
export function createSqliteConnection(config: SqliteConnectionConfig = {}): SqliteConnection {
  return new SqliteConnection(config);
}
