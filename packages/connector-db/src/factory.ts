/**
 * Connection factory for configuration-driven callers
 */

import type { ManagedConnection } from '@rowshift/core';
import type { ConnectionDescriptor } from './connection-string.js';
import { createMySQLConnection } from './mysql/connection.js';
import { createPostgresConnection } from './postgresql/connection.js';
import { createSqliteConnection } from './sqlite/connection.js';

export function createConnection(descriptor: ConnectionDescriptor): ManagedConnection {
  switch (descriptor.type) {
    case 'postgresql':
      return createPostgresConnection({
        connectionString: descriptor.connectionString,
        host: descriptor.host,
        port: descriptor.port,
        user: descriptor.user,
        password: descriptor.password,
        database: descriptor.database,
        ssl: descriptor.ssl,
      });

    case 'mysql':
      return createMySQLConnection({
        connectionString: descriptor.connectionString,
        host: descriptor.host,
        port: descriptor.port,
        user: descriptor.user,
        password: descriptor.password,
        database: descriptor.database,
        ssl: descriptor.ssl,
      });

    case 'sqlite':
      return createSqliteConnection({ path: descriptor.path });

    default: {
      const exhaustive: never = descriptor.type;
      throw new Error(`Unsupported database type: ${String(exhaustive)}`);
    }
  }
}
