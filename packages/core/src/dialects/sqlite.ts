import type { DialectName } from '../interfaces/index.js';
import { PostgresDialect } from './postgres.js';

/**
 * SQLite shares PostgreSQL's quoting and ON CONFLICT upserts but binds
 * positional `?` parameters. RIGHT and FULL joins need SQLite 3.39+.
 */
export class SqliteDialect extends PostgresDialect {
  override readonly name: DialectName = 'sqlite';
  // SQLITE_MAX_VARIABLE_NUMBER default since 3.32
  override readonly maxParameters: number = 32_766;

  override placeholder(): string {
    return '?';
  }
}
