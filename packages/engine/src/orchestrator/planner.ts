/**
 * Migration planning
 *
 * Every config-time check runs here, without I/O, before a row moves.
 */

import { z } from 'zod';
import {
  ConfigError,
  batchSizeSchema,
  failureRateSchema,
  formatZodIssues,
  migrationSpecSchema,
  pageSizeSchema,
  validateIdentifier,
  type MigrationSpec,
  type SqlDialect,
  type TransformRegistry,
} from '@rowshift/core';
import { buildJoinPlan } from '../join-graph/index.js';
import { QueryCompiler } from '../query/index.js';
import { resolveTransform } from '../transform/index.js';
import {
  DEFAULT_BATCH_SIZE,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PREFETCH_PAGES,
  DEFAULT_RETRY_DELAY_MS,
  MAX_PREFETCH_PAGES,
  type EngineOptions,
  type MigrationPlan,
  type SourceColumn,
} from '../types/index.js';

export const engineOptionsSchema = z.object({
  pageSize: pageSizeSchema.optional(),
  batchSize: batchSizeSchema.optional(),
  prefetchPages: z.number().int().min(1).max(MAX_PREFETCH_PAGES).optional(),
  retryDelayMs: z.number().int().min(0).max(60_000).optional(),
  maxTransformFailureRate: failureRateSchema.optional(),
  maxWriteFailureRate: failureRateSchema.optional(),
});

export interface ResolvedEngineOptions {
  pageSize: number;
  batchSize: number;
  prefetchPages: number;
  retryDelayMs: number;
  maxTransformFailureRate?: number;
  maxWriteFailureRate?: number;
}

/**
 * Validate run options and apply defaults
 * @throws ConfigError (INVALID_OPTIONS)
 */
export function resolveEngineOptions(options: EngineOptions = {}): ResolvedEngineOptions {
  const parsed = engineOptionsSchema.safeParse({
    pageSize: options.pageSize,
    batchSize: options.batchSize,
    prefetchPages: options.prefetchPages,
    retryDelayMs: options.retryDelayMs,
    maxTransformFailureRate: options.maxTransformFailureRate,
    maxWriteFailureRate: options.maxWriteFailureRate,
  });

  if (!parsed.success) {
    throw new ConfigError({
      code: 'INVALID_OPTIONS',
      message: formatZodIssues('Invalid engine options', parsed.error),
    });
  }

  const data = parsed.data;
  return {
    pageSize: data.pageSize ?? DEFAULT_PAGE_SIZE,
    batchSize: data.batchSize ?? DEFAULT_BATCH_SIZE,
    prefetchPages: data.prefetchPages ?? DEFAULT_PREFETCH_PAGES,
    retryDelayMs: data.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS,
    maxTransformFailureRate: data.maxTransformFailureRate,
    maxWriteFailureRate: data.maxWriteFailureRate,
  };
}

/** Reads compile for the source, inserts for the target */
export interface PlanDialects {
  source: SqlDialect;
  target: SqlDialect;
}

function invalid(message: string, migration: string, suggestion?: string): ConfigError {
  return new ConfigError({ code: 'INVALID_OPTIONS', message, migration, suggestion });
}

/**
 * Validate a migration and compile everything it needs
 * @throws ConfigError for any invalid declaration
 */
export function planMigration(
  input: MigrationSpec,
  registry: TransformRegistry,
  dialects: SqlDialect | PlanDialects,
  options: EngineOptions = {}
): MigrationPlan {
  const { source, target } = 'quoteIdentifier' in dialects ? { source: dialects, target: dialects } : dialects;

  const parsed = migrationSpecSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError({
      code: 'INVALID_OPTIONS',
      message: formatZodIssues(`Invalid migration "${input.name}"`, parsed.error),
      migration: input.name,
    });
  }

  const spec: MigrationSpec = parsed.data;
  const name = spec.name;
  const engine = resolveEngineOptions(options);
  const targetTable = spec.targetTable ?? spec.rootTable;
  validateIdentifier(targetTable, 'table', name);

  const joinPlan = buildJoinPlan(spec.rootTable, spec.joins, { migration: name, dialect: source });

  const pageSize = spec.pageSize ?? engine.pageSize;
  const batchSize = spec.batchSize ?? engine.batchSize;
  const compiler = new QueryCompiler(source);
  const query = compiler.compile(
    joinPlan,
    Object.keys(spec.columnMapping),
    pageSize,
    spec.pagination,
    name
  );

  const bySource = new Map<string, SourceColumn>(query.columns.map((c) => [c.qualified, c]));
  const mapping: Array<[SourceColumn, string]> = [];
  const targetColumns: string[] = [];

  for (const [qualified, target] of Object.entries(spec.columnMapping)) {
    const source = bySource.get(qualified);
    if (!source) {
      throw invalid(`Column "${qualified}" is missing from the compiled select list.`, name);
    }
    validateIdentifier(target, 'column', name);
    if (targetColumns.includes(target)) {
      throw invalid(`Target column "${target}" is mapped more than once.`, name);
    }
    mapping.push([source, target]);
    targetColumns.push(target);
  }

  for (const extra of spec.extraTargetColumns ?? []) {
    validateIdentifier(extra, 'column', name);
    if (targetColumns.includes(extra)) {
      throw invalid(`Extra target column "${extra}" is already a target column.`, name);
    }
    targetColumns.push(extra);
  }

  const transformName = spec.transformFunction;
  const transform = transformName ? resolveTransform(registry, transformName, name) : undefined;

  if (spec.extraTargetColumns?.length && !transform) {
    throw invalid(
      'extraTargetColumns is set but no transformFunction can fill them.',
      name,
      'Declare a transformFunction or remove extraTargetColumns.'
    );
  }

  const writeMode = spec.writeMode ?? 'insert';
  const conflictColumns = spec.conflictColumns ?? [];
  for (const column of conflictColumns) {
    if (!targetColumns.includes(column)) {
      throw invalid(`Conflict column "${column}" is not a target column.`, name);
    }
  }

  if (batchSize * targetColumns.length > target.maxParameters) {
    throw invalid(
      `A batch of ${batchSize} rows x ${targetColumns.length} columns exceeds ${target.name}'s limit of ${target.maxParameters} parameters.`,
      name,
      `Use a batchSize of at most ${Math.floor(target.maxParameters / targetColumns.length)}.`
    );
  }

  return {
    spec,
    name,
    targetTable,
    joinPlan,
    query,
    targetColumns,
    mapping,
    transformName,
    transform,
    writeMode,
    conflictColumns,
    batchSize,
    firstPage: compiler.pageStatement(query, query.pagination.mode === 'offset' ? { offset: 0 } : {}),
    insertSql: target.insertStatement(targetTable, targetColumns, batchSize, {
      mode: writeMode,
      conflictColumns,
    }),
  };
}
