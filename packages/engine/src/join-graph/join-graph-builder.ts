/**
 * JoinGraphBuilder
 *
 * Validates declared joins and linearizes them, in declaration order, into a
 * tree rooted at the migration's root table.
 */

import {
  ConfigError,
  validateIdentifier,
  type JoinSpec,
  type JoinType,
  type SqlDialect,
} from '@rowshift/core';
import type { OrderedJoinPlan, PlannedJoin } from '../types/index.js';
import { extractTableReferences } from './on-clause.js';

export interface JoinGraphOptions {
  /** Migration name for error reporting */
  migration?: string;
  /** When given, join types the dialect cannot execute fail fast */
  dialect?: SqlDialect;
}

export class JoinGraphBuilder {
  constructor(private readonly options: JoinGraphOptions = {}) {}

  build(rootTable: string, joins: readonly JoinSpec[] = []): OrderedJoinPlan {
    const migration = this.options.migration;
    validateIdentifier(rootTable, 'table', migration);

    const tables = new Set<string>([rootTable]);
    const planned: PlannedJoin[] = [];

    for (const [index, join] of joins.entries()) {
      validateIdentifier(join.table, 'table', migration);

      if (tables.has(join.table)) {
        throw new ConfigError({
          code: 'DUPLICATE_JOIN_TARGET',
          message: `Table "${join.table}" is joined more than once (join #${index + 1}).`,
          migration,
          suggestion: 'Join each table once; aliasing the same table twice is not supported.',
          context: { table: join.table },
        });
      }

      const type = this.resolveType(join);
      const references = extractTableReferences(join.onClause);
      const unknown = references.filter((t) => t !== join.table && !tables.has(t));

      if (unknown.length > 0) {
        throw new ConfigError({
          code: 'BROKEN_JOIN_GRAPH',
          message: `Join on "${join.table}" references ${unknown.map((t) => `"${t}"`).join(', ')} before ${unknown.length === 1 ? 'it is' : 'they are'} joined.`,
          migration,
          suggestion: `Reference only "${rootTable}" or tables joined earlier, or reorder the joins.`,
          context: { table: join.table, onClause: join.onClause, unknownTables: unknown },
        });
      }

      if (!references.some((t) => tables.has(t))) {
        throw new ConfigError({
          code: 'BROKEN_JOIN_GRAPH',
          message: `Join on "${join.table}" is not connected: its ON clause references no table already in the graph.`,
          migration,
          suggestion: 'Use qualified columns (table.column) on both sides of the ON clause.',
          context: { table: join.table, onClause: join.onClause },
        });
      }

      planned.push({ table: join.table, onClause: join.onClause, type, references });
      tables.add(join.table);
    }

    return { rootTable, joins: planned, tables };
  }

  private resolveType(join: JoinSpec): JoinType {
    const type = join.type ?? 'INNER';
    const dialect = this.options.dialect;

    if (dialect && !dialect.joinTypes.has(type)) {
      throw new ConfigError({
        code: 'UNSUPPORTED_JOIN_TYPE',
        message: `${type} JOIN on "${join.table}" is not supported by ${dialect.name}.`,
        migration: this.options.migration,
        suggestion: `Supported join types: ${[...dialect.joinTypes].join(', ')}.`,
      });
    }

    return type;
  }
}

/**
 * Build an ordered join plan
 * @throws ConfigError for duplicate targets, broken graphs or unsupported join types
 */
export function buildJoinPlan(
  rootTable: string,
  joins: readonly JoinSpec[] = [],
  options: JoinGraphOptions = {}
): OrderedJoinPlan {
  return new JoinGraphBuilder(options).build(rootTable, joins);
}
