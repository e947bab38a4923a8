import { describe, expect, it } from 'vitest';
import { ABSENT, present, rowFromObject, rowToObject, toDriverValue, type TransformFunction } from '@rowshift/core';
import { TransformPipeline, createRegistry, projectRow, resolveTransform, type SourceColumn } from '../src/index.js';

function column(qualified: string): SourceColumn {
  const [table = '', name = ''] = qualified.split('.');
  return { qualified, table, column: name };
}

const mapping: Array<[SourceColumn, string]> = [
  [column('users.id'), 'id'],
  [column('users.username'), 'username'],
  [column('profiles.phone'), 'phone'],
];

const source = rowFromObject({ 'users.id': 1, 'users.username': 'a', 'profiles.phone': null, 'users.secret': 'x' });

describe('projectRow', () => {
  it('restricts and renames, keeping absent values absent', () => {
    const projected = projectRow(source, mapping);

    expect([...projected.keys()]).toEqual(['id', 'username', 'phone']);
    expect(projected.get('phone')).toBe(ABSENT);
    expect(rowToObject(projected)).toEqual({ id: 1, username: 'a', phone: null });
  });

  it('does not coerce zero or empty strings', () => {
    const projected = projectRow(rowFromObject({ 'users.id': 0, 'users.username': '' }), mapping);
    expect(projected.get('id')).toEqual(present(0));
    expect(projected.get('username')).toEqual(present(''));
  });
});

describe('TransformPipeline', () => {
  it('projects when no transform is declared', () => {
    const outcome = new TransformPipeline({ mapping }).apply(source);

    expect(outcome.status).toBe('transformed');
    if (outcome.status === 'transformed') {
      expect(rowToObject(outcome.row)).toEqual({ id: 1, username: 'a', phone: null });
    }
  });

  it('overlays transform output and fills the declared extra columns', () => {
    const shout: TransformFunction = ({ projected }) => ({
      username: String(toDriverValue(projected.get('username'))).toUpperCase(),
      display: `#${String(toDriverValue(projected.get('id')))}`,
    });
    const pipeline = new TransformPipeline({
      mapping,
      targetColumns: ['id', 'username', 'phone', 'display'],
      transform: shout,
      transformName: 'shout',
    });

    const outcome = pipeline.apply(source);
    expect(outcome.status).toBe('transformed');
    if (outcome.status === 'transformed') {
      expect([...outcome.row.keys()]).toEqual(['id', 'username', 'phone', 'display']);
      expect(rowToObject(outcome.row)).toEqual({ id: 1, username: 'A', phone: null, display: '#1' });
    }
  });

  it('accepts Map fragments and reads raw source columns', () => {
    const pipeline = new TransformPipeline({
      mapping,
      transform: ({ source: raw }) => new Map([['phone', raw.get('users.secret') ?? ABSENT]]),
    });

    const outcome = pipeline.apply(source);
    expect(outcome.status === 'transformed' && rowToObject(outcome.row)).toEqual({ id: 1, username: 'a', phone: 'x' });
  });

  it('skips rows the transform returns null for', () => {
    const pipeline = new TransformPipeline({ mapping, transform: () => null });
    expect(pipeline.apply(source)).toEqual({ status: 'skipped' });
  });

  it('isolates a throwing transform as a TransformError', () => {
    const pipeline = new TransformPipeline({
      migration: 'users',
      mapping,
      transformName: 'explode',
      transform: () => {
        throw new Error('boom');
      },
    });

    const outcome = pipeline.apply(source);
    expect(outcome.status).toBe('failed');
    if (outcome.status === 'failed') {
      expect(outcome.error).toMatchObject({
        name: 'TransformError',
        code: 'TRANSFORM_FAILED',
        message: 'Transform "explode" threw: boom',
        migration: 'users',
      });
    }
  });

  it('rejects columns outside the target column set', () => {
    const pipeline = new TransformPipeline({ mapping, transformName: 'leak', transform: () => ({ password: 'test-secret' }) });

    const outcome = pipeline.apply(source);
    expect(outcome.status === 'failed' && outcome.error.code).toBe('UNEXPECTED_COLUMN');
  });

  it('identifies rows by the first mapped column', () => {
    expect(new TransformPipeline({ mapping }).identify(source)).toEqual({ column: 'users.id', value: 1 });
  });

  it('hands the transform copies of the rows', () => {
    const pipeline = new TransformPipeline({
      mapping,
      transform: ({ projected, source: raw }) => {
        projected.clear();
        raw.clear();
        return {};
      },
    });

    const outcome = pipeline.apply(source);
    expect(outcome.status === 'transformed' && rowToObject(outcome.row)).toEqual({ id: 1, username: 'a', phone: null });
    expect(source.size).toBe(4);
  });
});

describe('resolveTransform', () => {
  const registry = createRegistry({ upper: () => ({}), lower: () => ({}) });

  it('returns registered functions', () => {
    expect(resolveTransform(registry, 'upper')).toBe(registry['upper']);
  });

  it('lists the registered names for unknown transforms', () => {
    expect(() => resolveTransform(registry, 'title', 'users')).toThrow(
      expect.objectContaining({
        code: 'UNKNOWN_TRANSFORM',
        message: 'Transform function "title" is not registered.',
        suggestion: 'Registered transforms: lower, upper.',
      })
    );
  });

  it('ignores inherited properties', () => {
    expect(() => resolveTransform(registry, 'toString')).toThrow(expect.objectContaining({ code: 'UNKNOWN_TRANSFORM' }));
  });

  it('freezes the registry', () => {
    expect(Object.isFrozen(registry)).toBe(true);
  });
});
