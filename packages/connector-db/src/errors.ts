/**
 * Classification of driver errors into the migration taxonomy
 */

import { ConnectionError, QueryError, WriteError, errorMessage, type MigrationError } from '@rowshift/core';

/** Node/driver error codes meaning the session is gone */
const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'ENOTFOUND',
  'EHOSTUNREACH',
  'PROTOCOL_CONNECTION_LOST',
  'ER_ACCESS_DENIED_ERROR',
  'ER_CON_COUNT_ERROR',
  'SQLITE_CANTOPEN',
  'SQLITE_NOTADB',
  // PostgreSQL: admin_shutdown, crash_shutdown, cannot_connect_now
  '57P01',
  '57P02',
  '57P03',
  // PostgreSQL: invalid_authorization_specification, invalid_password
  '28000',
  '28P01',
]);

function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isConnectionFailure(error: unknown): boolean {
  const code = errorCode(error);
  if (!code) {
    return error instanceof Error && /connection terminated|not queryable|pool .*(ended|closed)/i.test(error.message);
  }
  // SQLSTATE class 08: connection exception
  return CONNECTION_ERROR_CODES.has(code) || /^08[0-9A-Z]{3}$/.test(code);
}

/**
 * Map a driver error raised by a read or a write
 */
export function classifyDriverError(
  error: unknown,
  operation: 'query' | 'write',
  database: string
): MigrationError {
  const message = `${database} ${operation === 'query' ? 'query' : 'write'} failed: ${errorMessage(error)}`;
  const code = errorCode(error);
  const context = code ? { driverCode: code } : undefined;

  if (isConnectionFailure(error)) {
    return new ConnectionError({
      message,
      cause: error,
      context,
      suggestion: 'Check that the database is reachable and the credentials are valid.',
    });
  }

  return operation === 'query'
    ? new QueryError({ message, cause: error, context })
    : new WriteError({ message, cause: error, context });
}

/**
 * Wrap a failure to open a session
 */
export function connectionFailed(error: unknown, database: string): ConnectionError {
  return new ConnectionError({
    message: `${database} connection failed: ${errorMessage(error)}`,
    cause: error,
    suggestion: 'Check host, port, database, user, and password.',
  });
}
