import { describe, expect, it } from 'vitest';
import {
  ABSENT,
  ConfigError,
  fragmentEntries,
  fromDriverValue,
  parseQualifiedColumn,
  present,
  rowFromObject,
  rowToObject,
  toDriverValue,
} from '../src/index.js';

describe('tagged values', () => {
  it('treats null and undefined as absent but keeps empty and zero values', () => {
    expect(fromDriverValue(null)).toEqual(ABSENT);
    expect(fromDriverValue(undefined)).toEqual(ABSENT);
    expect(fromDriverValue('')).toEqual(present(''));
    expect(fromDriverValue(0)).toEqual(present(0));
  });

  it('binds absent cells as SQL NULL', () => {
    expect(toDriverValue(ABSENT)).toBeNull();
    expect(toDriverValue(undefined)).toBeNull();
    expect(toDriverValue(present(false))).toBe(false);
  });

  it('normalizes plain-object fragments', () => {
    expect(fragmentEntries({ login: 'A', phone: null })).toEqual([
      ['login', present('A')],
      ['phone', ABSENT],
    ]);
  });

  it('accepts maps holding cells or raw values', () => {
    const fragment = new Map<string, unknown>([
      ['login', present('A')],
      ['phone', '555'],
    ]);
    expect(fragmentEntries(fragment)).toEqual([
      ['login', present('A')],
      ['phone', present('555')],
    ]);
  });

  it('round-trips rows through plain objects preserving order', () => {
    const row = rowFromObject({ b: 1, a: null });
    expect([...row.keys()]).toEqual(['b', 'a']);
    expect(rowToObject(row)).toEqual({ b: 1, a: null });
  });
});

describe('parseQualifiedColumn', () => {
  it('splits table and column', () => {
    expect(parseQualifiedColumn('users.id')).toEqual({ table: 'users', column: 'id' });
  });

  it('rejects unqualified or over-qualified references', () => {
    expect(() => parseQualifiedColumn('id')).toThrow(ConfigError);
    expect(() => parseQualifiedColumn('public.users.id')).toThrow(ConfigError);
  });

  it('rejects unsafe identifiers', () => {
    expect(() => parseQualifiedColumn('users.id;DROP')).toThrow(
      expect.objectContaining({ name: 'ConfigError', code: 'INVALID_IDENTIFIER' })
    );
  });
});
