/**
 * Compiled migration plans
 */

import type {
  JoinType,
  MigrationSpec,
  QualifiedColumn,
  TransformFunction,
  WriteMode,
} from '@rowshift/core';

export interface PlannedJoin {
  table: string;
  onClause: string;
  type: JoinType;
  /** Tables the ON clause references through qualified identifiers */
  references: string[];
}

/** Joins in declaration order, rooted at `rootTable` */
export interface OrderedJoinPlan {
  rootTable: string;
  joins: PlannedJoin[];
  /** Root plus every joined table */
  tables: ReadonlySet<string>;
}

export interface SourceColumn {
  /** `table.column`, also the result label */
  qualified: QualifiedColumn;
  table: string;
  column: string;
}

export type ResolvedPagination =
  | { mode: 'offset'; orderBy: SourceColumn[] }
  | { mode: 'keyset'; key: SourceColumn };

export interface CompiledQuery {
  /** SELECT ... FROM ... JOIN ... without ordering or paging */
  baseSql: string;
  /** Select list in result order; mapped columns first */
  columns: SourceColumn[];
  pagination: ResolvedPagination;
  pageSize: number;
}

/** One page's statement */
export interface PageStatement {
  sql: string;
  params: unknown[];
}

export interface MigrationPlan {
  spec: MigrationSpec;
  name: string;
  targetTable: string;
  joinPlan: OrderedJoinPlan;
  query: CompiledQuery;
  /** Mapping targets followed by extra target columns */
  targetColumns: string[];
  /** Source column -> target column, in mapping order */
  mapping: Array<[SourceColumn, string]>;
  transformName?: string;
  transform?: TransformFunction;
  writeMode: WriteMode;
  conflictColumns: string[];
  batchSize: number;
  /** First page's read statement */
  firstPage: PageStatement;
  /** Insert statement for a full batch */
  insertSql: string;
}
