/**
 * TransformPipeline
 *
 * Projects a source row (keyed by qualified column) onto the target shape
 * and, when declared, overlays the transform function's output.
 */

import {
  ABSENT,
  TransformError,
  errorMessage,
  fragmentEntries,
  toDriverValue,
  type CellValue,
  type Row,
  type RowFragment,
  type RowIdentifier,
  type TransformFunction,
} from '@rowshift/core';
import type { SourceColumn } from '../types/index.js';

export type TransformOutcome =
  | { status: 'transformed'; row: Row }
  | { status: 'skipped' }
  | { status: 'failed'; error: TransformError };

export interface TransformPipelineOptions {
  migration?: string;
  mapping: ReadonlyArray<readonly [SourceColumn, string]>;
  /** Insert column set; defaults to the mapping targets */
  targetColumns?: readonly string[];
  transform?: TransformFunction;
  transformName?: string;
}

function isThenable(value: object): boolean {
  return 'then' in value && typeof value.then === 'function';
}

function isRowFragment(value: unknown): value is RowFragment {
  if (value instanceof Map) return true;
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isThenable(value);
}

/**
 * Rename and restrict a source row per the mapping; absent stays absent
 */
export function projectRow(
  source: ReadonlyMap<string, CellValue>,
  mapping: ReadonlyArray<readonly [SourceColumn, string]>
): Row {
  const projected: Row = new Map();
  for (const [column, target] of mapping) {
    projected.set(target, source.get(column.qualified) ?? ABSENT);
  }
  return projected;
}

export class TransformPipeline {
  private readonly targetColumns: readonly string[];
  private readonly allowed: ReadonlySet<string>;

  constructor(private readonly options: TransformPipelineOptions) {
    this.targetColumns = options.targetColumns ?? options.mapping.map(([, target]) => target);
    this.allowed = new Set(this.targetColumns);
  }

  /** Diagnostic key of a source row: its first mapped column */
  identify(source: ReadonlyMap<string, CellValue>): RowIdentifier | undefined {
    const first = this.options.mapping[0];
    if (!first) return undefined;
    const column = first[0].qualified;
    return { column, value: toDriverValue(source.get(column)) };
  }

  project(source: ReadonlyMap<string, CellValue>): Row {
    return projectRow(source, this.options.mapping);
  }

  apply(source: Row): TransformOutcome {
    const projected = this.project(source);
    const transform = this.options.transform;

    if (!transform) {
      return { status: 'transformed', row: this.complete(projected) };
    }

    let output: unknown;
    try {
      output = transform({ projected: new Map(projected), source: new Map(source) });
    } catch (err) {
      return this.fail(`Transform "${this.transformName}" threw: ${errorMessage(err)}`, err);
    }

    if (output === null) {
      return { status: 'skipped' };
    }
    if (!isRowFragment(output)) {
      const what = typeof output === 'object' && output !== null && isThenable(output) ? 'a Promise' : typeof output;
      return this.fail(`Transform "${this.transformName}" returned ${what}; expected a row object, a Map or null.`);
    }

    const merged = projected;
    for (const [column, cell] of fragmentEntries(output)) {
      if (!this.allowed.has(column)) {
        return this.fail(
          `Transform "${this.transformName}" produced column "${column}", which is not a target column.`,
          undefined,
          'UNEXPECTED_COLUMN'
        );
      }
      merged.set(column, cell);
    }

    return { status: 'transformed', row: this.complete(merged) };
  }

  private get transformName(): string {
    return this.options.transformName ?? 'anonymous';
  }

  /** Order by the insert column set, filling gaps with absent */
  private complete(row: Row): Row {
    const out: Row = new Map();
    for (const column of this.targetColumns) {
      out.set(column, row.get(column) ?? ABSENT);
    }
    return out;
  }

  private fail(
    message: string,
    cause?: unknown,
    code: 'TRANSFORM_FAILED' | 'UNEXPECTED_COLUMN' = 'TRANSFORM_FAILED'
  ): TransformOutcome {
    return {
      status: 'failed',
      error: new TransformError({ code, message, migration: this.options.migration, cause }),
    };
  }
}
