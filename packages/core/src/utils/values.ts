/**
 * Helpers for tagged cell values and rows
 */

import type { AbsentValue, CellValue, PresentValue, Row, RowFragment } from '../types/index.js';

export const ABSENT: AbsentValue = Object.freeze({ kind: 'absent' });

export function present(value: unknown): PresentValue {
  return { kind: 'present', value };
}

export function isAbsent(cell: CellValue | undefined): boolean {
  return cell === undefined || cell.kind === 'absent';
}

/**
 * Driver value to cell: SQL NULL (null or undefined) becomes absent
 */
export function fromDriverValue(value: unknown): CellValue {
  return value === null || value === undefined ? ABSENT : present(value);
}

/**
 * Cell to driver parameter: absent becomes SQL NULL
 */
export function toDriverValue(cell: CellValue | undefined): unknown {
  return cell === undefined || cell.kind === 'absent' ? null : cell.value;
}

function isCellValue(value: unknown): value is CellValue {
  if (typeof value !== 'object' || value === null || !('kind' in value)) return false;
  return value.kind === 'absent' || (value.kind === 'present' && 'value' in value);
}

function isRowMap(fragment: RowFragment): fragment is ReadonlyMap<string, unknown> {
  return fragment instanceof Map;
}

/**
 * Normalize a transform's output into ordered (column, cell) entries
 */
export function fragmentEntries(fragment: RowFragment): Array<[string, CellValue]> {
  if (isRowMap(fragment)) {
    const entries: Array<[string, CellValue]> = [];
    for (const [column, value] of fragment) {
      entries.push([column, isCellValue(value) ? value : fromDriverValue(value)]);
    }
    return entries;
  }

  return Object.entries(fragment).map(([column, value]) => [column, fromDriverValue(value)]);
}

/**
 * Build a row from a plain object, e.g. in tests or fixtures
 */
export function rowFromObject(values: { [column: string]: unknown }): Row {
  return new Map(Object.entries(values).map(([column, value]) => [column, fromDriverValue(value)]));
}

/**
 * Plain object view of a row; absent cells become null
 */
export function rowToObject(row: ReadonlyMap<string, CellValue>): { [column: string]: unknown } {
  const out: { [column: string]: unknown } = {};
  for (const [column, cell] of row) {
    out[column] = toDriverValue(cell);
  }
  return out;
}
