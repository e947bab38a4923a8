import type { JoinType } from '../types/index.js';
import { BaseDialect } from './base-dialect.js';

export class MySQLDialect extends BaseDialect {
  readonly name = 'mysql' as const;
  // MySQL has no FULL OUTER JOIN
  readonly joinTypes: ReadonlySet<JoinType> = new Set<JoinType>(['INNER', 'LEFT', 'RIGHT']);

  quoteIdentifier(identifier: string): string {
    return `\`${identifier.replace(/`/g, '``')}\``;
  }

  placeholder(): string {
    return '?';
  }

  protected upsertClause(conflictColumns: readonly string[], updateColumns: readonly string[]): string {
    // MySQL resolves conflicts on any unique key; a self-assignment makes it a no-op
    const columns = updateColumns.length > 0 ? updateColumns : conflictColumns.slice(0, 1);
    const assignments = columns
      .map((c) => `${this.quoteIdentifier(c)} = VALUES(${this.quoteIdentifier(c)})`)
      .join(', ');
    return `ON DUPLICATE KEY UPDATE ${assignments}`;
  }
}
