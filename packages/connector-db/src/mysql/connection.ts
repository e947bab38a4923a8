/**
 * MySQL Connection
 *
 * DatabaseConnection over a mysql2/promise pool. Transactions and snapshots
 * each hold one pooled connection.
 */

import mysql from 'mysql2/promise';
import {
  dialectFor,
  type ManagedConnection,
  type QueryResult,
  type ReadSnapshot,
  type SqlDialect,
  type Transaction,
} from '@rowshift/core';
import { classifyDriverError, connectionFailed } from '../errors.js';
import { resolveServerDescriptor, type ConnectionDescriptor } from '../connection-string.js';

export interface MySQLConnectionConfig extends Omit<ConnectionDescriptor, 'type' | 'path'> {
  /** Connection pool size */
  connectionLimit?: number;
}

function toPositionalRows(rows: unknown): unknown[][] {
  const out: unknown[][] = [];
  if (!Array.isArray(rows)) return out;
  for (const row of rows) {
    if (Array.isArray(row)) out.push(row);
  }
  return out;
}

function affectedRows(result: unknown): number {
  if (typeof result === 'object' && result !== null && 'affectedRows' in result) {
    return typeof result.affectedRows === 'number' ? result.affectedRows : 0;
  }
  return 0;
}

function toQueryResult(rows: unknown, fields: mysql.FieldPacket[] | undefined): QueryResult {
  return {
    fields: (fields ?? []).map((field) => field.name),
    rows: toPositionalRows(rows),
  };
}

/** Consistent-snapshot, read-only transaction on one connection */
class MySQLSnapshot implements ReadSnapshot {
  private closed = false;

  constructor(private readonly connection: mysql.PoolConnection) {}

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    try {
      const [rows, fields] = await this.connection.query({ sql, rowsAsArray: true }, params);
      return toQueryResult(rows, fields);
    } catch (error) {
      throw classifyDriverError(error, 'query', 'MySQL');
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.connection.commit();
    } catch (error) {
      throw classifyDriverError(error, 'query', 'MySQL');
    } finally {
      this.connection.release();
    }
  }
}

class MySQLTransaction implements Transaction {
  private done = false;

  constructor(private readonly connection: mysql.PoolConnection) {}

  async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const [result] = await this.connection.query(sql, params);
      return affectedRows(result);
    } catch (error) {
      throw classifyDriverError(error, 'write', 'MySQL');
    }
  }

  async commit(): Promise<void> {
    await this.finish(() => this.connection.commit());
  }

  async rollback(): Promise<void> {
    await this.finish(() => this.connection.rollback());
  }

  private async finish(action: () => Promise<void>): Promise<void> {
    if (this.done) return;
    this.done = true;

    try {
      await action();
    } catch (error) {
      throw classifyDriverError(error, 'write', 'MySQL');
    } finally {
      this.connection.release();
    }
  }
}

export class MySQLConnection implements ManagedConnection {
  readonly dialect: SqlDialect = dialectFor('mysql');
  private pool: mysql.Pool;

  constructor(config: MySQLConnectionConfig = {}) {
    const resolved = config.connectionString
      ? undefined
      : resolveServerDescriptor({ ...config, type: 'mysql' });

    this.pool = mysql.createPool({
      uri: config.connectionString,
      host: resolved?.host,
      port: resolved?.port,
      database: resolved?.database,
      user: resolved?.user,
      password: resolved?.password,
      ssl: typeof config.ssl === 'object' ? config.ssl : config.ssl ? {} : undefined,
      connectionLimit: config.connectionLimit ?? 10,
      waitForConnections: true,
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const connection = await this.pool.getConnection();
      connection.release();
    } catch (error) {
      throw connectionFailed(error, 'MySQL');
    }
  }

  /**
   * Close all connections
   */
  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async testConnection(): Promise<boolean> {
    try {
      await this.pool.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    try {
      const [rows, fields] = await this.pool.query({ sql, rowsAsArray: true }, params);
      return toQueryResult(rows, fields);
    } catch (error) {
      throw classifyDriverError(error, 'query', 'MySQL');
    }
  }

  async begin(): Promise<Transaction> {
    let connection: mysql.PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw connectionFailed(error, 'MySQL');
    }

    try {
      await connection.beginTransaction();
    } catch (error) {
      connection.release();
      throw classifyDriverError(error, 'write', 'MySQL');
    }

    return new MySQLTransaction(connection);
  }

  async snapshot(): Promise<ReadSnapshot> {
    let connection: mysql.PoolConnection;
    try {
      connection = await this.pool.getConnection();
    } catch (error) {
      throw connectionFailed(error, 'MySQL');
    }

    try {
      await connection.query('SET TRANSACTION ISOLATION LEVEL REPEATABLE READ');
      await connection.query('START TRANSACTION WITH CONSISTENT SNAPSHOT, READ ONLY');
    } catch (error) {
      connection.release();
      throw classifyDriverError(error, 'query', 'MySQL');
    }

    return new MySQLSnapshot(connection);
  }
}

/**
 * Factory function to create a MySQL connection
 */
export function createMySQLConnection(config: MySQLConnectionConfig = {}): MySQLConnection {
  return new MySQLConnection(config);
}
