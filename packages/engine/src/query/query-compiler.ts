/**
 * QueryCompiler
 *
 * Compiles a join plan and the mapped source columns into one SELECT and
 * reads it page by page. Result columns are resolved by label; position is
 * used only when the driver reports no labels.
 */

import {
  ConfigError,
  ConnectionError,
  QueryError,
  errorMessage,
  fromDriverValue,
  parseQualifiedColumn,
  toDriverValue,
  wrapError,
  type DatabaseConnection,
  type Logger,
  type PaginationSpec,
  type QueryResult,
  type ReadSnapshot,
  type Row,
  type SqlDialect,
} from '@rowshift/core';
import { singleRetry, withRetries } from '../retry.js';
import type {
  CompiledQuery,
  OrderedJoinPlan,
  PageStatement,
  ResolvedPagination,
  SourceColumn,
} from '../types/index.js';

export interface CompileOptions {
  dialect: SqlDialect;
  pageSize: number;
  pagination?: PaginationSpec;
  migration?: string;
}

/** Where the next page starts */
export type PageCursor = { offset: number } | { after?: unknown };

function resolveColumn(
  qualified: string,
  joinPlan: OrderedJoinPlan,
  migration: string | undefined
): SourceColumn {
  const { table, column } = parseQualifiedColumn(qualified, migration);

  if (!joinPlan.tables.has(table)) {
    throw new ConfigError({
      code: 'INVALID_COLUMN_REFERENCE',
      message: `Column "${qualified}" references table "${table}", which is neither the root table nor joined.`,
      migration,
      suggestion: `Available tables: ${[...joinPlan.tables].join(', ')}.`,
      context: { column: qualified },
    });
  }

  return { qualified, table, column };
}

export class QueryCompiler {
  constructor(private readonly dialect: SqlDialect) {}

  compile(
    joinPlan: OrderedJoinPlan,
    qualifiedColumns: readonly string[],
    pageSize: number,
    pagination?: PaginationSpec,
    migration?: string
  ): CompiledQuery {
    if (qualifiedColumns.length === 0) {
      throw new ConfigError({
        code: 'INVALID_OPTIONS',
        message: 'No source columns to select.',
        migration,
      });
    }

    const columns = qualifiedColumns.map((q) => resolveColumn(q, joinPlan, migration));
    const resolved = this.resolvePagination(columns, joinPlan, pagination, migration);

    // The keyset cursor is read from each page's last row
    const keyColumn = resolved.mode === 'keyset' ? resolved.key : undefined;
    if (keyColumn && !columns.some((c) => c.qualified === keyColumn.qualified)) {
      columns.push(keyColumn);
    }

    const q = (identifier: string) => this.dialect.quoteIdentifier(identifier);
    const selectList = columns
      .map((c) => `${q(c.table)}.${q(c.column)} AS ${q(c.qualified)}`)
      .join(', ');

    const parts = [`SELECT ${selectList}`, `FROM ${q(joinPlan.rootTable)}`];
    for (const join of joinPlan.joins) {
      const keyword = join.type === 'FULL' ? 'FULL OUTER JOIN' : `${join.type} JOIN`;
      parts.push(`${keyword} ${q(join.table)} ON ${join.onClause}`);
    }

    return { baseSql: parts.join(' '), columns, pagination: resolved, pageSize };
  }

  /**
   * Statement for one page
   */
  pageStatement(query: CompiledQuery, cursor: PageCursor): PageStatement {
    const q = (c: SourceColumn) =>
      `${this.dialect.quoteIdentifier(c.table)}.${this.dialect.quoteIdentifier(c.column)}`;
    const pagination = query.pagination;

    if (pagination.mode === 'offset') {
      const offset = 'offset' in cursor ? cursor.offset : 0;
      const orderBy = pagination.orderBy.map(q).join(', ');
      return {
        sql: `${query.baseSql} ORDER BY ${orderBy} ${this.dialect.limitClause(query.pageSize, offset)}`,
        params: [],
      };
    }

    const key = q(pagination.key);
    const limit = this.dialect.limitClause(query.pageSize);
    if ('after' in cursor && cursor.after !== undefined) {
      return {
        sql: `${query.baseSql} WHERE ${key} > ${this.dialect.placeholder(1)} ORDER BY ${key} ${limit}`,
        params: [cursor.after],
      };
    }
    return { sql: `${query.baseSql} ORDER BY ${key} ${limit}`, params: [] };
  }

  private resolvePagination(
    columns: SourceColumn[],
    joinPlan: OrderedJoinPlan,
    pagination: PaginationSpec | undefined,
    migration: string | undefined
  ): ResolvedPagination {
    if (pagination?.mode === 'keyset') {
      return { mode: 'keyset', key: resolveColumn(pagination.key, joinPlan, migration) };
    }

    // Default: every selected column, so ties only occur between identical tuples
    const orderBy = pagination?.orderBy?.map((c) => resolveColumn(c, joinPlan, migration));
    return { mode: 'offset', orderBy: orderBy ?? [...columns] };
  }
}

/**
 * Compile a paged read query
 * @throws ConfigError for column references outside the join graph
 */
export function compileQuery(
  joinPlan: OrderedJoinPlan,
  qualifiedColumns: readonly string[],
  options: CompileOptions
): CompiledQuery {
  return new QueryCompiler(options.dialect).compile(
    joinPlan,
    qualifiedColumns,
    options.pageSize,
    options.pagination,
    options.migration
  );
}

/**
 * Align a driver result with the compiled select list
 */
export function resolveRows(
  result: QueryResult,
  columns: readonly SourceColumn[],
  migration?: string
): Row[] {
  let indexes: number[];

  if (result.fields.length > 0) {
    indexes = columns.map((c) => {
      const index = result.fields.indexOf(c.qualified);
      if (index < 0) {
        throw new QueryError({
          message: `Result has no column labelled "${c.qualified}" (got ${result.fields.join(', ')}).`,
          migration,
        });
      }
      return index;
    });
  } else {
    indexes = columns.map((_, i) => i);
  }

  return result.rows.map((values) => {
    if (values.length < columns.length) {
      throw new QueryError({
        message: `Result row has ${values.length} value(s), expected ${columns.length}.`,
        migration,
      });
    }
    const row: Row = new Map();
    columns.forEach((c, i) => {
      const index = indexes[i] ?? i;
      row.set(c.qualified, fromDriverValue(values[index]));
    });
    return row;
  });
}

export interface ReadPagesOptions {
  retryDelayMs: number;
  signal?: AbortSignal;
  logger?: Logger;
  migration?: string;
  onPage?: (page: number, rows: number) => void;
}

async function openSnapshot(
  connection: DatabaseConnection,
  migration: string | undefined
): Promise<ReadSnapshot | undefined> {
  if (!connection.snapshot) return undefined;
  try {
    return await connection.snapshot();
  } catch (err) {
    throw wrapError(err, 'query', migration);
  }
}

/**
 * Lazily read every page of a compiled query, on one snapshot where the
 * connection offers it. Each page is retried once; connection failures
 * are not retried.
 */
export async function* readPages(
  connection: DatabaseConnection,
  query: CompiledQuery,
  options: ReadPagesOptions
): AsyncGenerator<Row[], void, undefined> {
  const compiler = new QueryCompiler(connection.dialect);
  const { migration, logger } = options;
  let cursor: PageCursor = query.pagination.mode === 'offset' ? { offset: 0 } : {};
  let page = 0;
  const snapshot = await openSnapshot(connection, migration);
  const reader = snapshot ?? connection;

  try {
    while (!options.signal?.aborted) {
      const statement = compiler.pageStatement(query, cursor);
      logger?.debug('Reading page', { page, sql: statement.sql });

      let rows: Row[];
      try {
        rows = await withRetries(
          async () => resolveRows(await reader.query(statement.sql, statement.params), query.columns, migration),
          singleRetry(options.retryDelayMs),
          (err) => !(err instanceof ConnectionError),
          (err, next) =>
            logger?.warn('Page read failed, retrying', {
              page,
              attempt: next.attempt,
              error: err instanceof Error ? err.message : String(err),
            })
        );
      } catch (err) {
        throw wrapError(err, 'query', migration);
      }

      options.onPage?.(page, rows.length);
      page++;

      if (rows.length > 0) {
        yield rows;
      }
      if (rows.length < query.pageSize) {
        return;
      }

      if (query.pagination.mode === 'offset') {
        cursor = { offset: ('offset' in cursor ? cursor.offset : 0) + rows.length };
      } else {
        const key = query.pagination.key.qualified;
        const last = rows[rows.length - 1]?.get(key);
        if (last === undefined || last.kind === 'absent') {
          throw new QueryError({
            message: `Keyset column "${key}" is NULL; keyset pagination needs a non-null key.`,
            migration,
            suggestion: 'Choose a unique, non-null key column or use offset pagination.',
          });
        }
        cursor = { after: toDriverValue(last) };
      }
    }
  } finally {
    if (snapshot) {
      try {
        await snapshot.close();
      } catch (err) {
        logger?.warn('Closing read snapshot failed', { error: errorMessage(err) });
      }
    }
  }
}
