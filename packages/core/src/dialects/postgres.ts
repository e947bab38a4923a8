import type { DialectName } from '../interfaces/index.js';
import type { JoinType } from '../types/index.js';
import { BaseDialect } from './base-dialect.js';

export class PostgresDialect extends BaseDialect {
  readonly name: DialectName = 'postgresql';
  readonly joinTypes: ReadonlySet<JoinType> = new Set<JoinType>(['INNER', 'LEFT', 'RIGHT', 'FULL']);

  quoteIdentifier(identifier: string): string {
    return `"${identifier.replace(/"/g, '""')}"`;
  }

  placeholder(index: number): string {
    return `$${index}`;
  }

  protected upsertClause(conflictColumns: readonly string[], updateColumns: readonly string[]): string {
    const target = conflictColumns.map((c) => this.quoteIdentifier(c)).join(', ');
    if (updateColumns.length === 0) {
      return `ON CONFLICT (${target}) DO NOTHING`;
    }
    const assignments = updateColumns
      .map((c) => `${this.quoteIdentifier(c)} = excluded.${this.quoteIdentifier(c)}`)
      .join(', ');
    return `ON CONFLICT (${target}) DO UPDATE SET ${assignments}`;
  }
}
