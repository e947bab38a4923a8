/**
 * rowshift command
 *
 * Usage:
 *   rowshift --config ./migrations.yaml [--transforms ./transforms.js] [--dry-run]
 *            [--format text|json] [--log-level debug|info|warn|error|silent]
 */

import {
  Logger,
  MigrationError,
  dialectFor,
  errorMessage,
  type LogLevel,
  type ManagedConnection,
  type RunStatus,
  type TransformRegistry,
} from '@rowshift/core';
import { createConnection, type ConnectionDescriptor } from '@rowshift/connector-db';
import {
  MigrationOrchestrator,
  formatReport,
  planMigration,
  type MigrationPlan,
  type ReportFormat,
} from '@rowshift/engine';
import { ConfigFileError, loadConfig, type LoadedConfig } from './config.js';
import { loadTransforms } from './transforms.js';

export const USAGE = [
  'Usage: rowshift --config <migrations.yaml> [options]',
  '',
  'Options:',
  '  --transforms <module>  Module exporting transform functions (default or "registry" export)',
  '  --dry-run              Validate and print the compiled plan without touching the databases',
  '  --format <text|json>   Report format (default: text)',
  '  --log-level <level>    debug, info, warn, error or silent (default: info)',
  '  --help                 Show this message',
].join('\n');

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliArgs {
  config?: string;
  transforms?: string;
  dryRun: boolean;
  format: ReportFormat;
  logLevel?: LogLevel;
  help: boolean;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * @throws UsageError for unknown flags or missing values
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const args: CliArgs = { dryRun: false, format: 'text', help: false };

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = () => {
      const next = argv[++i];
      if (next === undefined || next.startsWith('--')) {
        throw new UsageError(`${flag} needs a value`);
      }
      return next;
    };

    switch (flag) {
      case '--config':
        args.config = value();
        break;
      case '--transforms':
        args.transforms = value();
        break;
      case '--dry-run':
        args.dryRun = true;
        break;
      case '--format': {
        const format = value();
        if (format !== 'text' && format !== 'json') {
          throw new UsageError(`--format must be text or json (got ${format})`);
        }
        args.format = format;
        break;
      }
      case '--log-level': {
        const level = value();
        if (!isLogLevel(level)) {
          throw new UsageError(`--log-level must be one of ${LOG_LEVELS.join(', ')} (got ${level})`);
        }
        args.logLevel = level;
        break;
      }
      case '--help':
      case '-h':
        args.help = true;
        break;
      default:
        throw new UsageError(`Unknown argument: ${flag}`);
    }
  }

  if (!args.help && !args.config) {
    throw new UsageError('--config is required');
  }
  return args;
}

/** 0 completed, 2 completed with errors or cancelled, 1 failed */
export function exitCodeFor(status: RunStatus): number {
  switch (status) {
    case 'completed':
      return 0;
    case 'completed_with_errors':
    case 'cancelled':
      return 2;
    case 'failed':
      return 1;
  }
}

export interface CliIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
  /** Cancels the run when aborted, e.g. on SIGINT */
  signal?: AbortSignal;
  connect?: (descriptor: ConnectionDescriptor) => ManagedConnection;
}

function describeDescriptor(descriptor: ConnectionDescriptor): string {
  if (descriptor.type === 'sqlite') return `sqlite (${descriptor.path ?? ':memory:'})`;
  return `${descriptor.type} (${descriptor.host ?? 'localhost'}${descriptor.database ? `/${descriptor.database}` : ''})`;
}

function formatPlans(plans: MigrationPlan[], format: ReportFormat): string {
  const summaries = plans.map((plan) => ({
    name: plan.name,
    targetTable: plan.targetTable,
    joins: plan.joinPlan.joins.map((j) => `${j.type} ${j.table}`),
    targetColumns: plan.targetColumns,
    transform: plan.transformName ?? null,
    writeMode: plan.writeMode,
    pageSize: plan.query.pageSize,
    batchSize: plan.batchSize,
    firstPage: plan.firstPage.sql,
  }));

  if (format === 'json') {
    return JSON.stringify(summaries, null, 2);
  }

  return summaries
    .map((s) =>
      [
        `${s.name} -> ${s.targetTable} (${s.writeMode}, page ${s.pageSize}, batch ${s.batchSize})`,
        `  columns: ${s.targetColumns.join(', ')}`,
        ...(s.joins.length > 0 ? [`  joins: ${s.joins.join(', ')}`] : []),
        ...(s.transform ? [`  transform: ${s.transform}`] : []),
        `  query: ${s.firstPage}`,
      ].join('\n')
    )
    .join('\n');
}

function dryRun(config: LoadedConfig, registry: TransformRegistry): MigrationPlan[] {
  const dialects = { source: dialectFor(config.source.type), target: dialectFor(config.target.type) };
  return config.migrations.map((spec) => planMigration(spec, registry, dialects, config.options));
}

async function execute(args: CliArgs, io: CliIo, logger: Logger, config: LoadedConfig): Promise<number> {
  const transforms = args.transforms ?? config.transforms;
  const registry = transforms ? await loadTransforms(transforms) : {};

  if (args.dryRun) {
    io.stdout(`${formatPlans(dryRun(config, registry), args.format)}\n`);
    return 0;
  }

  const connect = io.connect ?? createConnection;
  const source = connect(config.source);
  const target = connect(config.target);

  try {
    logger.info('Connecting', { source: describeDescriptor(config.source), target: describeDescriptor(config.target) });
    await source.connect();
    await target.connect();

    const orchestrator = new MigrationOrchestrator(source, target, registry, {
      ...config.options,
      signal: io.signal,
      logger,
    });
    const report = await orchestrator.run(config.migrations);

    io.stdout(`${formatReport(report, args.format)}\n`);
    return exitCodeFor(report.status);
  } finally {
    const closed = await Promise.allSettled([source.disconnect(), target.disconnect()]);
    for (const result of closed) {
      if (result.status === 'rejected') {
        logger.warn('Disconnect failed', { error: errorMessage(result.reason) });
      }
    }
  }
}

/**
 * Run the command
 * @returns process exit code
 */
export async function runCli(argv: readonly string[], io: CliIo): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (error) {
    io.stderr(`${errorMessage(error)}\n\n${USAGE}\n`);
    return 1;
  }

  if (args.help || !args.config) {
    io.stdout(`${USAGE}\n`);
    return 0;
  }

  let logger = new Logger({ level: args.logLevel, write: io.stderr });

  try {
    const config = await loadConfig(args.config, io.env);
    logger = new Logger({
      level: args.logLevel ?? config.logging.level,
      format: config.logging.format,
      write: io.stderr,
    });
    return await execute(args, io, logger, config);
  } catch (error) {
    if (error instanceof MigrationError) {
      io.stderr(`${error.toActionableMessage()}\n`);
    } else if (error instanceof ConfigFileError) {
      io.stderr(`${error.message}\n`);
    } else {
      logger.error('rowshift failed', { error });
    }
    return 1;
  }
}
