/**
 * Cell and row types flowing through the migration pipeline
 */

/** A cell that holds a real value (which may be an empty string or zero) */
export interface PresentValue {
  readonly kind: 'present';
  readonly value: unknown;
}

/** A missing/NULL cell, kept distinct from any real value */
export interface AbsentValue {
  readonly kind: 'absent';
}

export type CellValue = PresentValue | AbsentValue;

/**
 * Ordered row. Source rows are keyed by qualified column (`table.column`),
 * target rows by target column name.
 */
export type Row = Map<string, CellValue>;

/**
 * What a transform function may hand back: a full row, or an overlay.
 * Map entries may be cells or raw values; raw `null` and `undefined`
 * mean absent.
 */
export type RowFragment = ReadonlyMap<string, unknown> | { [column: string]: unknown };
