export type {
  DialectName,
  QueryResult,
  Transaction,
  ReadSnapshot,
  InsertStatementOptions,
  SqlDialect,
  DatabaseConnection,
  ManagedConnection,
} from './connection.js';
