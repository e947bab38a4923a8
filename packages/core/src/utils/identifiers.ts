/**
 * SQL identifier helpers
 */

import { ConfigError } from '../errors/index.js';

/** Valid SQL identifier pattern (alphanumeric + underscore, must start with letter/underscore) */
const VALID_IDENTIFIER = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

export function isValidIdentifier(name: string): boolean {
  return VALID_IDENTIFIER.test(name);
}

/**
 * Validate that a string is a safe SQL identifier
 */
export function validateIdentifier(name: string, type: string, migration?: string): void {
  if (!isValidIdentifier(name)) {
    throw new ConfigError({
      code: 'INVALID_IDENTIFIER',
      message: `Invalid ${type} name: "${name}". Must be alphanumeric with underscores, starting with a letter or underscore.`,
      migration,
      suggestion: `Use only valid SQL identifiers for ${type} names.`,
    });
  }
}

export interface ParsedColumn {
  table: string;
  column: string;
}

/**
 * Split a `table.column` reference
 */
export function parseQualifiedColumn(qualified: string, migration?: string): ParsedColumn {
  const parts = qualified.split('.');
  const [table, column] = parts;

  if (parts.length !== 2 || !table || !column) {
    throw new ConfigError({
      code: 'INVALID_COLUMN_REFERENCE',
      message: `Column reference "${qualified}" is not of the form table.column.`,
      migration,
      suggestion: 'Qualify every source column with its table name.',
    });
  }

  validateIdentifier(table, 'table', migration);
  validateIdentifier(column, 'column', migration);
  return { table, column };
}
