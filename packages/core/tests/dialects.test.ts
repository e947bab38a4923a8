import { describe, expect, it } from 'vitest';
import { ConfigError, dialectFor } from '../src/index.js';

describe('SQL dialects', () => {
  it('builds positional multi-row inserts for PostgreSQL', () => {
    const sql = dialectFor('postgresql').insertStatement('accounts', ['id', 'login'], 2);
    expect(sql).toBe('INSERT INTO "accounts" ("id", "login") VALUES ($1, $2), ($3, $4)');
  });

  it('uses ? placeholders and backticks for MySQL', () => {
    const sql = dialectFor('mysql').insertStatement('accounts', ['id', 'login'], 2);
    expect(sql).toBe('INSERT INTO `accounts` (`id`, `login`) VALUES (?, ?), (?, ?)');
  });

  it('uses ? placeholders and double quotes for SQLite', () => {
    const sql = dialectFor('sqlite').insertStatement('accounts', ['id'], 1);
    expect(sql).toBe('INSERT INTO "accounts" ("id") VALUES (?)');
  });

  it('emits ON CONFLICT upserts for PostgreSQL and SQLite', () => {
    const options = { mode: 'upsert' as const, conflictColumns: ['id'] };
    expect(dialectFor('postgresql').insertStatement('accounts', ['id', 'login'], 1, options)).toBe(
      'INSERT INTO "accounts" ("id", "login") VALUES ($1, $2) ON CONFLICT ("id") DO UPDATE SET "login" = excluded."login"'
    );
    expect(dialectFor('sqlite').insertStatement('accounts', ['id'], 1, options)).toBe(
      'INSERT INTO "accounts" ("id") VALUES (?) ON CONFLICT ("id") DO NOTHING'
    );
  });

  it('emits ON DUPLICATE KEY UPDATE upserts for MySQL', () => {
    const sql = dialectFor('mysql').insertStatement('accounts', ['id', 'login'], 1, {
      mode: 'upsert',
      conflictColumns: ['id'],
    });
    expect(sql).toBe(
      'INSERT INTO `accounts` (`id`, `login`) VALUES (?, ?) ON DUPLICATE KEY UPDATE `login` = VALUES(`login`)'
    );
  });

  it('rejects upserts without conflict columns', () => {
    expect(() =>
      dialectFor('postgresql').insertStatement('accounts', ['id'], 1, { mode: 'upsert' })
    ).toThrow(ConfigError);
  });

  it('knows which join types each engine supports', () => {
    expect(dialectFor('postgresql').joinTypes.has('FULL')).toBe(true);
    expect(dialectFor('mysql').joinTypes.has('FULL')).toBe(false);
    expect(dialectFor('mysql').joinTypes.has('RIGHT')).toBe(true);
  });

  it('escapes quote characters inside identifiers', () => {
    expect(dialectFor('postgresql').quoteIdentifier('we"ird')).toBe('"we""ird"');
    expect(dialectFor('mysql').quoteIdentifier('we`ird')).toBe('`we``ird`');
  });

  it('renders LIMIT with an optional OFFSET', () => {
    expect(dialectFor('postgresql').limitClause(10)).toBe('LIMIT 10');
    expect(dialectFor('postgresql').limitClause(10, 0)).toBe('LIMIT 10');
    expect(dialectFor('mysql').limitClause(10, 20)).toBe('LIMIT 10 OFFSET 20');
  });
});
