/**
 * YAML configuration
 *
 * databases:
 *   source: { type: postgresql, host: db, user: app, password_env_var: SOURCE_DB_PASSWORD }
 *   target: { type: sqlite, path: ./out.db }
 * migrations:
 *   - name: users
 *     root_table: users
 *     joins: [{ table: profiles, on: users.id = profiles.user_id, type: left }]
 *     column_mapping: { users.id: id, profiles.phone: phone }
 */

import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import {
  batchSizeSchema,
  failureRateSchema,
  formatZodIssues,
  joinTypeSchema,
  pageSizeSchema,
  qualifiedColumnSchema,
  type LogFormat,
  type LogLevel,
  type MigrationSpec,
} from '@rowshift/core';
import type { ConnectionDescriptor } from '@rowshift/connector-db';
import type { EngineOptions } from '@rowshift/engine';

export type ConfiguredOptions = Pick<
  EngineOptions,
  'pageSize' | 'batchSize' | 'prefetchPages' | 'retryDelayMs' | 'maxTransformFailureRate' | 'maxWriteFailureRate'
>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

export class ConfigFileError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigFileError';
  }
}

export type EnvExpansionOptions = {
  env?: NodeJS.ProcessEnv;
  /**
   * If true, missing env vars leave placeholders unchanged instead of erroring.
   * Default: false (fail-fast).
   */
  allowMissing?: boolean;
};

function expandEnvInString(input: string, options?: EnvExpansionOptions): string {
  const env = options?.env ?? process.env;
  return input.replace(/\$\{([^}]+)\}/g, (match, inner: string) => {
    const [rawName, rawDefault] = inner.split(':-', 2);
    const name = (rawName ?? '').trim();
    if (!name) return match;

    const envValue = env[name];
    if (envValue !== undefined && envValue !== '') return envValue;

    if (rawDefault !== undefined) return rawDefault;

    if (options?.allowMissing) return match;

    throw new ConfigFileError(`Missing required environment variable: ${name}`);
  });
}

/**
 * Expand `${VAR}` and `${VAR:-default}` in every string of a parsed document
 */
export function expandEnvVars(value: unknown, options?: EnvExpansionOptions): unknown {
  if (typeof value === 'string') {
    return expandEnvInString(value, options);
  }
  if (Array.isArray(value)) {
    return value.map((v) => expandEnvVars(v, options));
  }
  if (isPlainObject(value)) {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) {
      out[k] = expandEnvVars(v, options);
    }
    return out;
  }
  return value;
}

/** Rename alias keys to their canonical name unless both are present */
function withAliases(aliases: Record<string, string>) {
  return (value: unknown): unknown => {
    if (!isPlainObject(value)) return value;
    const out: Record<string, unknown> = { ...value };
    for (const [alias, canonical] of Object.entries(aliases)) {
      if (alias in out && !(canonical in out)) {
        out[canonical] = out[alias];
        delete out[alias];
      }
    }
    return out;
  };
}

const sslSchema = z.union([
  z.boolean(),
  z.object({ reject_unauthorized: z.boolean().optional() }).strict(),
]);

export const databaseSchema = z
  .object({
    type: z.enum(['postgresql', 'mysql', 'sqlite']),
    connection_string: z.string().min(1).optional(),
    host: z.string().min(1).optional(),
    port: z.number().int().min(1).max(65535).optional(),
    user: z.string().min(1).optional(),
    password: z.string().optional(),
    password_env_var: z.string().min(1).optional(),
    database: z.string().min(1).optional(),
    path: z.string().min(1).optional(),
    ssl: sslSchema.optional(),
  })
  .strict();

export type DatabaseEntry = z.infer<typeof databaseSchema>;

const joinEntrySchema = z.preprocess(
  withAliases({ on: 'on_clause' }),
  z
    .object({
      table: z.string().min(1),
      on_clause: z.string().min(1),
      type: joinTypeSchema.optional(),
    })
    .strict()
);

const paginationEntrySchema = z.discriminatedUnion('mode', [
  z
    .object({
      mode: z.literal('offset'),
      order_by: z.array(qualifiedColumnSchema).min(1).optional(),
    })
    .strict(),
  z
    .object({
      mode: z.literal('keyset'),
      key: qualifiedColumnSchema,
    })
    .strict(),
]);

export const migrationEntrySchema = z.preprocess(
  withAliases({ columns: 'column_mapping', insert_function: 'transform_function' }),
  z
    .object({
      name: z.string().min(1),
      root_table: z.string().min(1),
      target_table: z.string().min(1).optional(),
      joins: z.array(joinEntrySchema).optional(),
      column_mapping: z.record(z.string().min(1)),
      transform_function: z.string().min(1).optional(),
      extra_target_columns: z.array(z.string().min(1)).optional(),
      pagination: paginationEntrySchema.optional(),
      write_mode: z.enum(['insert', 'upsert']).optional(),
      conflict_columns: z.array(z.string().min(1)).min(1).optional(),
      page_size: pageSizeSchema.optional(),
      batch_size: batchSizeSchema.optional(),
    })
    .strict()
);

export type MigrationEntry = z.infer<typeof migrationEntrySchema>;

const optionsSchema = z
  .object({
    page_size: pageSizeSchema.optional(),
    batch_size: batchSizeSchema.optional(),
    prefetch_pages: z.number().int().min(1).max(2).optional(),
    retry_delay_ms: z.number().int().min(0).max(60_000).optional(),
    max_transform_failure_rate: failureRateSchema.optional(),
    max_write_failure_rate: failureRateSchema.optional(),
  })
  .strict();

const loggingSchema = z
  .object({
    level: z.enum(['debug', 'info', 'warn', 'error', 'silent']).optional(),
    format: z.enum(['text', 'json']).optional(),
  })
  .strict();

export const configFileSchema = z
  .object({
    databases: z
      .object({
        source: databaseSchema,
        target: databaseSchema,
      })
      .strict(),
    migrations: z.array(migrationEntrySchema).min(1),
    transforms: z.string().min(1).optional(),
    options: optionsSchema.optional(),
    logging: loggingSchema.optional(),
  })
  .strict()
  .superRefine((value, ctx) => {
    const names = new Set<string>();
    value.migrations.forEach((entry, i) => {
      if (names.has(entry.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate migration name: ${entry.name}`,
          path: ['migrations', i, 'name'],
        });
      }
      names.add(entry.name);
    });
  });

export type ConfigFile = z.infer<typeof configFileSchema>;

export interface LoadedConfig {
  source: ConnectionDescriptor;
  target: ConnectionDescriptor;
  migrations: MigrationSpec[];
  /** Transform module, resolved against the config file's directory */
  transforms?: string;
  options: ConfiguredOptions;
  logging: { level?: LogLevel; format?: LogFormat };
}

/**
 * Descriptor for a database entry; `password_env_var` wins over `password`
 */
export function toConnectionDescriptor(
  entry: DatabaseEntry,
  env: NodeJS.ProcessEnv = process.env
): ConnectionDescriptor {
  const fromEnv = entry.password_env_var ? env[entry.password_env_var] : undefined;
  const ssl =
    typeof entry.ssl === 'object' ? { rejectUnauthorized: entry.ssl.reject_unauthorized } : entry.ssl;

  return {
    type: entry.type,
    connectionString: entry.connection_string,
    host: entry.host,
    port: entry.port,
    user: entry.user,
    password: fromEnv || entry.password,
    database: entry.database,
    path: entry.path,
    ssl,
  };
}

export function toMigrationSpec(entry: MigrationEntry): MigrationSpec {
  const pagination = entry.pagination;
  return {
    name: entry.name,
    rootTable: entry.root_table,
    targetTable: entry.target_table,
    joins: entry.joins?.map((join) => ({ table: join.table, onClause: join.on_clause, type: join.type })),
    columnMapping: entry.column_mapping,
    transformFunction: entry.transform_function,
    extraTargetColumns: entry.extra_target_columns,
    pagination:
      pagination?.mode === 'offset'
        ? { mode: 'offset', orderBy: pagination.order_by }
        : pagination,
    writeMode: entry.write_mode,
    conflictColumns: entry.conflict_columns,
    pageSize: entry.page_size,
    batchSize: entry.batch_size,
  };
}

export interface ParseConfigOptions {
  env?: NodeJS.ProcessEnv;
  /** Shown in error messages */
  label?: string;
  /** Directory relative paths are resolved against */
  baseDir?: string;
}

/**
 * Parse and validate configuration text
 * @throws ConfigFileError with one line per invalid path
 */
export function parseConfig(text: string, options: ParseConfigOptions = {}): LoadedConfig {
  const label = options.label ?? 'config';
  const env = options.env ?? process.env;

  let document: unknown;
  try {
    document = parseYaml(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    throw new ConfigFileError(
      `Invalid YAML in ${label}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = configFileSchema.safeParse(expandEnvVars(document, { env }));
  if (!result.success) {
    throw new ConfigFileError(formatZodIssues(`Invalid ${label}`, result.error));
  }

  const config = result.data;
  const baseDir = options.baseDir ?? process.cwd();
  const withPath = (entry: DatabaseEntry): DatabaseEntry =>
    entry.path ? { ...entry, path: resolve(baseDir, entry.path) } : entry;
  const opts = config.options ?? {};

  return {
    source: toConnectionDescriptor(withPath(config.databases.source), env),
    target: toConnectionDescriptor(withPath(config.databases.target), env),
    migrations: config.migrations.map(toMigrationSpec),
    transforms: config.transforms ? resolve(baseDir, config.transforms) : undefined,
    options: {
      pageSize: opts.page_size,
      batchSize: opts.batch_size,
      prefetchPages: opts.prefetch_pages,
      retryDelayMs: opts.retry_delay_ms,
      maxTransformFailureRate: opts.max_transform_failure_rate,
      maxWriteFailureRate: opts.max_write_failure_rate,
    },
    logging: config.logging ?? {},
  };
}

/**
 * Read and validate a YAML configuration file
 */
export async function loadConfig(configPath: string, env: NodeJS.ProcessEnv = process.env): Promise<LoadedConfig> {
  const absolutePath = resolve(process.cwd(), configPath);

  let content: string;
  try {
    content = await readFile(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigFileError(
      `Cannot read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  return parseConfig(content, { env, label: configPath, baseDir: dirname(absolutePath) });
}
