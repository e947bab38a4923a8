import { describe, expect, it } from 'vitest';
import { dialectFor, type MigrationSpec } from '@rowshift/core';
import { planMigration, resolveEngineOptions } from '../src/index.js';

const postgres = dialectFor('postgresql');

const users: MigrationSpec = {
  name: 'users',
  rootTable: 'users',
  columnMapping: { 'users.id': 'id', 'users.username': 'login' },
  batchSize: 2,
};

describe('planMigration', () => {
  it('compiles the first page and the batch insert', () => {
    const plan = planMigration(users, {}, postgres, { pageSize: 10 });

    expect(plan.targetTable).toBe('users');
    expect(plan.targetColumns).toEqual(['id', 'login']);
    expect(plan.writeMode).toBe('insert');
    expect(plan.firstPage.sql).toBe(
      'SELECT "users"."id" AS "users.id", "users"."username" AS "users.username" FROM "users" ORDER BY "users"."id", "users"."username" LIMIT 10'
    );
    expect(plan.insertSql).toBe('INSERT INTO "users" ("id", "login") VALUES ($1, $2), ($3, $4)');
  });

  it('reads with the source dialect and writes with the target dialect', () => {
    const plan = planMigration({ ...users, pageSize: 5 }, {}, {
      source: dialectFor('mysql'),
      target: postgres,
    });

    expect(plan.firstPage.sql).toBe(
      'SELECT `users`.`id` AS `users.id`, `users`.`username` AS `users.username` FROM `users` ORDER BY `users`.`id`, `users`.`username` LIMIT 5'
    );
    expect(plan.insertSql).toBe('INSERT INTO "users" ("id", "login") VALUES ($1, $2), ($3, $4)');
  });

  it('checks join types against the source dialect', () => {
    const spec: MigrationSpec = {
      ...users,
      joins: [{ table: 'profiles', onClause: 'users.id = profiles.user_id', type: 'FULL' }],
    };

    expect(() => planMigration(spec, {}, { source: dialectFor('mysql'), target: postgres })).toThrow(
      expect.objectContaining({ code: 'UNSUPPORTED_JOIN_TYPE' })
    );
  });

  it('appends extra target columns after the mapping', () => {
    const plan = planMigration(
      { ...users, transformFunction: 'decorate', extraTargetColumns: ['display'] },
      { decorate: () => ({}) },
      postgres
    );
    expect(plan.targetColumns).toEqual(['id', 'login', 'display']);
    expect(plan.transformName).toBe('decorate');
  });

  it('resolves transforms eagerly', () => {
    expect(() => planMigration({ ...users, transformFunction: 'missing' }, { present: () => ({}) }, postgres)).toThrow(
      expect.objectContaining({ name: 'ConfigError', code: 'UNKNOWN_TRANSFORM', migration: 'users' })
    );
  });

  it('rejects mapped columns from tables outside the graph', () => {
    const spec = { ...users, columnMapping: { 'users.id': 'id', 'orders.total': 'total' } };
    expect(() => planMigration(spec, {}, postgres)).toThrow(
      expect.objectContaining({ code: 'INVALID_COLUMN_REFERENCE' })
    );
  });

  it('rejects invalid write options', () => {
    expect(() => planMigration({ ...users, writeMode: 'upsert' }, {}, postgres)).toThrow(
      expect.objectContaining({ code: 'INVALID_OPTIONS' })
    );
    expect(() =>
      planMigration({ ...users, writeMode: 'upsert', conflictColumns: ['uuid'] }, {}, postgres)
    ).toThrow(expect.objectContaining({ message: 'Conflict column "uuid" is not a target column.' }));
    expect(() => planMigration({ ...users, columnMapping: { 'users.id': 'id', 'users.login': 'id' } }, {}, postgres)).toThrow(
      expect.objectContaining({ message: 'Target column "id" is mapped more than once.' })
    );
    expect(() => planMigration({ ...users, extraTargetColumns: ['display'] }, {}, postgres)).toThrow(
      expect.objectContaining({ code: 'INVALID_OPTIONS' })
    );
  });

  it('keeps batches under the parameter limit', () => {
    const spec = {
      ...users,
      batchSize: 10_000,
      columnMapping: { 'users.a': 'a', 'users.b': 'b', 'users.c': 'c', 'users.d': 'd' },
    };

    expect(() => planMigration(spec, {}, dialectFor('sqlite'))).toThrow(
      expect.objectContaining({
        code: 'INVALID_OPTIONS',
        suggestion: 'Use a batchSize of at most 8191.',
      })
    );
  });
});

describe('resolveEngineOptions', () => {
  it('applies defaults', () => {
    expect(resolveEngineOptions()).toEqual({
      pageSize: 1000,
      batchSize: 500,
      prefetchPages: 1,
      retryDelayMs: 250,
      maxTransformFailureRate: undefined,
      maxWriteFailureRate: undefined,
    });
  });

  it('rejects out-of-range values', () => {
    expect(() => resolveEngineOptions({ prefetchPages: 3 })).toThrow(expect.objectContaining({ code: 'INVALID_OPTIONS' }));
    expect(() => resolveEngineOptions({ maxWriteFailureRate: 1.5 })).toThrow(
      expect.objectContaining({ code: 'INVALID_OPTIONS' })
    );
  });
});
