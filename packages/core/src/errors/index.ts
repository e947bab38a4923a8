export {
  MigrationError,
  ConfigError,
  ConnectionError,
  QueryError,
  TransformError,
  WriteError,
  wrapError,
  errorMessage,
} from './migration-error.js';
export type {
  ConfigErrorCode,
  MigrationErrorCode,
  MigrationErrorDetails,
} from './migration-error.js';
