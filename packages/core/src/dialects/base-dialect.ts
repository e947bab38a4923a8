/**
 * Shared SQL generation for dialects
 */

import { ConfigError } from '../errors/index.js';
import type { DialectName, InsertStatementOptions, SqlDialect } from '../interfaces/index.js';
import type { JoinType } from '../types/index.js';

export abstract class BaseDialect implements SqlDialect {
  abstract readonly name: DialectName;
  abstract readonly joinTypes: ReadonlySet<JoinType>;
  readonly maxParameters: number = 65_535;

  abstract quoteIdentifier(identifier: string): string;
  abstract placeholder(index: number): string;

  /** Upsert tail for the given conflict and update columns */
  protected abstract upsertClause(conflictColumns: readonly string[], updateColumns: readonly string[]): string;

  limitClause(limit: number, offset?: number): string {
    return offset ? `LIMIT ${limit} OFFSET ${offset}` : `LIMIT ${limit}`;
  }

  insertStatement(
    table: string,
    columns: readonly string[],
    rowCount: number,
    options: InsertStatementOptions = {}
  ): string {
    if (columns.length === 0 || rowCount < 1) {
      throw new Error(`Cannot build an insert for ${rowCount} row(s) of ${columns.length} column(s)`);
    }

    const columnList = columns.map((c) => this.quoteIdentifier(c)).join(', ');
    const tuples: string[] = [];
    let paramIndex = 1;

    for (let r = 0; r < rowCount; r++) {
      const placeholders = columns.map(() => this.placeholder(paramIndex++));
      tuples.push(`(${placeholders.join(', ')})`);
    }

    let sql = `INSERT INTO ${this.quoteIdentifier(table)} (${columnList}) VALUES ${tuples.join(', ')}`;

    if (options.mode === 'upsert') {
      const conflictColumns = options.conflictColumns ?? [];
      if (conflictColumns.length === 0) {
        throw new ConfigError({
          code: 'INVALID_OPTIONS',
          message: `Upsert into "${table}" needs at least one conflict column.`,
          suggestion: 'Set conflictColumns to the target key columns.',
        });
      }
      const updateColumns = columns.filter((c) => !conflictColumns.includes(c));
      sql += ` ${this.upsertClause(conflictColumns, updateColumns)}`;
    }

    return sql;
  }
}
