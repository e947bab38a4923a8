import {
  WriteError,
  dialectFor,
  type DatabaseConnection,
  type DialectName,
  type QueryResult,
  type ReadSnapshot,
  type SqlDialect,
  type Transaction,
} from '@rowshift/core';
import { SqliteConnection } from '@rowshift/connector-db';

/** Source answering each query with the next scripted result */
export class ScriptedSource implements DatabaseConnection {
  readonly dialect: SqlDialect;
  readonly calls: Array<{ sql: string; params: unknown[] }> = [];

  constructor(
    private readonly responses: Array<QueryResult | Error>,
    dialect: DialectName = 'postgresql'
  ) {
    this.dialect = dialectFor(dialect);
  }

  async query(sql: string, params: unknown[] = []): Promise<QueryResult> {
    this.calls.push({ sql, params });
    const next = this.responses.shift();
    if (next === undefined) return { fields: [], rows: [] };
    if (next instanceof Error) throw next;
    return next;
  }

  async begin(): Promise<Transaction> {
    throw new Error('ScriptedSource is read-only');
  }
}

/** Scripted source that also hands out read snapshots, logging their use */
export class SnapshotSource extends ScriptedSource {
  readonly sessions: string[] = [];

  async snapshot(): Promise<ReadSnapshot> {
    this.sessions.push('OPEN');
    return {
      query: (sql, params) => {
        this.sessions.push('QUERY');
        return this.query(sql, params);
      },
      close: async () => {
        this.sessions.push('CLOSE');
      },
    };
  }
}

/** Target recording transaction traffic; `failExecute` injects failures by call number */
export class RecordingTarget implements DatabaseConnection {
  readonly dialect: SqlDialect;
  readonly log: string[] = [];
  readonly statements: string[] = [];
  readonly committed: unknown[][] = [];
  private executeCalls = 0;

  constructor(
    private readonly failExecute: (call: number) => Error | undefined = () => undefined,
    dialect: DialectName = 'postgresql'
  ) {
    this.dialect = dialectFor(dialect);
  }

  async query(): Promise<QueryResult> {
    throw new Error('RecordingTarget is write-only');
  }

  async begin(): Promise<Transaction> {
    this.log.push('BEGIN');
    let pending: unknown[] | undefined;

    return {
      execute: async (sql: string, params: unknown[] = []) => {
        const call = ++this.executeCalls;
        this.log.push('EXECUTE');
        this.statements.push(sql);
        const failure = this.failExecute(call);
        if (failure) throw failure;
        pending = params;
        return params.length;
      },
      commit: async () => {
        this.log.push('COMMIT');
        if (pending) this.committed.push(pending);
      },
      rollback: async () => {
        this.log.push('ROLLBACK');
      },
    };
  }
}

/** Real target whose n-th executes fail */
export class FlakyTarget implements DatabaseConnection {
  private calls = 0;

  constructor(
    private readonly inner: DatabaseConnection,
    private readonly failOn: ReadonlySet<number>
  ) {}

  get dialect(): SqlDialect {
    return this.inner.dialect;
  }

  query(sql: string, params?: unknown[]): Promise<QueryResult> {
    return this.inner.query(sql, params);
  }

  async begin(): Promise<Transaction> {
    const tx = await this.inner.begin();
    return {
      execute: async (sql: string, params?: unknown[]) => {
        this.calls++;
        if (this.failOn.has(this.calls)) {
          throw new WriteError({ message: `injected failure on write ${this.calls}` });
        }
        return tx.execute(sql, params);
      },
      commit: () => tx.commit(),
      rollback: () => tx.rollback(),
    };
  }
}

export async function sqliteDatabase(ddl: string): Promise<SqliteConnection> {
  const connection = new SqliteConnection();
  await connection.connect();
  connection.exec(ddl);
  return connection;
}

export async function selectRows(connection: DatabaseConnection, sql: string): Promise<unknown[][]> {
  return (await connection.query(sql)).rows;
}
