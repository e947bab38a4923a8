/**
 * PostgreSQL Connection
 *
 * DatabaseConnection over a pg Pool. Reads use array row mode so rows can be
 * aligned by field name; each transaction or snapshot holds one pooled client.
 */

import pg from 'pg';
import {
  ConnectionError,
  dialectFor,
  type ManagedConnection,
  type QueryResult,
  type ReadSnapshot,
  type SqlDialect,
  type Transaction,
} from '@rowshift/core';
import { classifyDriverError, connectionFailed } from '../errors.js';
import { resolveServerDescriptor, type ConnectionDescriptor } from '../connection-string.js';

const { Pool } = pg;

export interface PostgresConnectionConfig extends Omit<ConnectionDescriptor, 'type' | 'path'> {
  /** Connection pool size */
  max?: number;
}

function toQueryResult(result: pg.QueryArrayResult<unknown[]>): QueryResult {
  return {
    fields: result.fields.map((field) => field.name),
    rows: result.rows,
  };
}

/**
 * REPEATABLE READ, READ ONLY transaction on one client.
 * Each read runs under a savepoint so a failed page can be retried.
 */
class PostgresSnapshot implements ReadSnapshot {
  private closed = false;

  constructor(private readonly client: pg.PoolClient) {}

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    try {
      await this.client.query('SAVEPOINT page_read');
    } catch (error) {
      throw classifyDriverError(error, 'query', 'PostgreSQL');
    }

    try {
      const result = await this.client.query<unknown[]>({ text: sql, values: params, rowMode: 'array' });
      await this.client.query('RELEASE SAVEPOINT page_read');
      return toQueryResult(result);
    } catch (error) {
      const classified = classifyDriverError(error, 'query', 'PostgreSQL');
      if (!(classified instanceof ConnectionError)) {
        try {
          await this.client.query('ROLLBACK TO SAVEPOINT page_read');
        } catch (rollbackError) {
          throw classifyDriverError(rollbackError, 'query', 'PostgreSQL');
        }
      }
      throw classified;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    try {
      await this.client.query('COMMIT');
      this.client.release();
    } catch (error) {
      this.client.release(error instanceof Error ? error : true);
      throw classifyDriverError(error, 'query', 'PostgreSQL');
    }
  }
}

class PostgresTransaction implements Transaction {
  private done = false;

  constructor(private readonly client: pg.PoolClient) {}

  async execute(sql: string, params?: unknown[]): Promise<number> {
    try {
      const result = await this.client.query(sql, params);
      return result.rowCount ?? 0;
    } catch (error) {
      throw classifyDriverError(error, 'write', 'PostgreSQL');
    }
  }

  async commit(): Promise<void> {
    await this.finish('COMMIT');
  }

  async rollback(): Promise<void> {
    await this.finish('ROLLBACK');
  }

  private async finish(statement: 'COMMIT' | 'ROLLBACK'): Promise<void> {
    if (this.done) return;
    this.done = true;

    try {
      await this.client.query(statement);
      this.client.release();
    } catch (error) {
      // Hand a broken client back to the pool for disposal
      this.client.release(error instanceof Error ? error : true);
      throw classifyDriverError(error, 'write', 'PostgreSQL');
    }
  }
}

export class PostgresConnection implements ManagedConnection {
  readonly dialect: SqlDialect = dialectFor('postgresql');
  private pool: pg.Pool;

  constructor(config: PostgresConnectionConfig = {}) {
    const resolved = config.connectionString
      ? undefined
      : resolveServerDescriptor({ ...config, type: 'postgresql' });

    this.pool = new Pool({
      connectionString: config.connectionString,
      host: resolved?.host,
      port: resolved?.port,
      database: resolved?.database,
      user: resolved?.user,
      password: resolved?.password,
      ssl: config.ssl,
      max: config.max ?? 10,
    });
  }

  /**
   * Test connection
   */
  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw connectionFailed(error, 'PostgreSQL');
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
      const result = await this.pool.query<unknown[]>({ text: sql, values: params, rowMode: 'array' });
      return toQueryResult(result);
    } catch (error) {
      throw classifyDriverError(error, 'query', 'PostgreSQL');
    }
  }

  async begin(): Promise<Transaction> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw connectionFailed(error, 'PostgreSQL');
    }

    try {
      await client.query('BEGIN');
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw classifyDriverError(error, 'write', 'PostgreSQL');
    }

    return new PostgresTransaction(client);
  }

  async snapshot(): Promise<ReadSnapshot> {
    let client: pg.PoolClient;
    try {
      client = await this.pool.connect();
    } catch (error) {
      throw connectionFailed(error, 'PostgreSQL');
    }

    try {
      await client.query('BEGIN TRANSACTION ISOLATION LEVEL REPEATABLE READ READ ONLY');
    } catch (error) {
      client.release(error instanceof Error ? error : true);
      throw classifyDriverError(error, 'query', 'PostgreSQL');
    }

    return new PostgresSnapshot(client);
  }
}

/**
 * Factory function to create a PostgreSQL connection
 */
export function createPostgresConnection(config: PostgresConnectionConfig = {}): PostgresConnection {
  return new PostgresConnection(config);
}
