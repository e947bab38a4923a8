/**
 * Declarative migration types
 */

import type { Row, RowFragment } from './value.js';

export const JOIN_TYPES = ['INNER', 'LEFT', 'RIGHT', 'FULL'] as const;

export type JoinType = (typeof JOIN_TYPES)[number];

/** `table.column` */
export type QualifiedColumn = string;

export interface JoinSpec {
  /** Table being joined */
  table: string;
  /** Predicate referencing the root table or previously joined tables */
  onClause: string;
  /** Join type (default: INNER) */
  type?: JoinType;
}

export type PaginationSpec =
  | {
      mode: 'offset';
      /** Ordering for stable pages (default: the first mapped column) */
      orderBy?: QualifiedColumn[];
    }
  | {
      mode: 'keyset';
      /** Unique, non-null, ascending key column */
      key: QualifiedColumn;
    };

export type WriteMode = 'insert' | 'upsert';

export interface MigrationSpec {
  /** Unique within a configuration, used for reporting */
  name: string;
  /** Anchor table of the join graph */
  rootTable: string;
  /** Destination table (default: rootTable) */
  targetTable?: string;
  joins?: JoinSpec[];
  /**
   * Qualified source column -> target column.
   * Insertion order is the insert column order.
   */
  columnMapping: { [source: QualifiedColumn]: string };
  /** Name resolved against the transform registry */
  transformFunction?: string;
  /** Target columns a transform may add beyond the mapping */
  extraTargetColumns?: string[];
  pagination?: PaginationSpec;
  writeMode?: WriteMode;
  /** Target columns identifying a row for upserts */
  conflictColumns?: string[];
  /** Per-migration overrides of run options */
  pageSize?: number;
  batchSize?: number;
}

/**
 * Input handed to a transform function.
 * `projected` is the renamed target row, `source` the raw joined row.
 */
export interface TransformInput {
  readonly projected: Row;
  readonly source: Row;
}

/**
 * Caller-supplied row transformation.
 * Returning `null` filters the row out.
 */
export type TransformFunction = (input: TransformInput) => RowFragment | null;

/** Closed, read-only mapping of transform names to functions */
export type TransformRegistry = Readonly<{ [name: string]: TransformFunction }>;
