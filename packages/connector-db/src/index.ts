/**
 * @rowshift/connector-db
 *
 * PostgreSQL, MySQL and SQLite connections for rowshift
 */

export { PostgresConnection, createPostgresConnection } from './postgresql/connection.js';
export type { PostgresConnectionConfig } from './postgresql/connection.js';

export { MySQLConnection, createMySQLConnection } from './mysql/connection.js';
export type { MySQLConnectionConfig } from './mysql/connection.js';

export { SqliteConnection, createSqliteConnection } from './sqlite/connection.js';
export type { SqliteConnectionConfig } from './sqlite/connection.js';

export { buildConnectionString, resolveServerDescriptor } from './connection-string.js';
export type { ConnectionDescriptor, ResolvedServerDescriptor, SslOption } from './connection-string.js';

export { createConnection } from './factory.js';
export { classifyDriverError, isConnectionFailure } from './errors.js';
