import type { DialectName, SqlDialect } from '../interfaces/index.js';
import { MySQLDialect } from './mysql.js';
import { PostgresDialect } from './postgres.js';
import { SqliteDialect } from './sqlite.js';

export { BaseDialect } from './base-dialect.js';
export { PostgresDialect, MySQLDialect, SqliteDialect };

const DIALECTS: Record<DialectName, SqlDialect> = {
  postgresql: new PostgresDialect(),
  mysql: new MySQLDialect(),
  sqlite: new SqliteDialect(),
};

/**
 * Shared dialect instance for a database type
 */
export function dialectFor(name: DialectName): SqlDialect {
  return DIALECTS[name];
}
