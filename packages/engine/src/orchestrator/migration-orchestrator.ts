/**
 * MigrationOrchestrator
 *
 * Plans and runs migrations strictly in declared order and aggregates
 * their results into one report. Engine errors never escape `run`: they
 * end up in the report.
 */

import { randomUUID } from 'crypto';
import {
  ConfigError,
  Logger,
  MigrationError,
  errorMessage,
  type DatabaseConnection,
  type MigrationReport,
  type MigrationResult,
  type MigrationSpec,
  type RunStatus,
  type TransformRegistry,
} from '@rowshift/core';
import type { EngineOptions, MigrationPlan } from '../types/index.js';
import { planMigration, resolveEngineOptions, type ResolvedEngineOptions } from './planner.js';
import { runMigration } from './migration-runner.js';

function failedResult(spec: MigrationSpec, error: MigrationError): MigrationResult {
  return {
    name: spec.name,
    targetTable: spec.targetTable ?? spec.rootTable,
    status: 'failed',
    rowsRead: 0,
    rowsTransformed: 0,
    rowsSkipped: 0,
    rowsFailedTransform: 0,
    rowsWritten: 0,
    rowsFailedWrite: 0,
    batchesCommitted: 0,
    batchesFailed: 0,
    errors: [{ stage: error.stage, code: error.code, message: error.message }],
    durationMs: 0,
  };
}

function runStatus(migrations: MigrationResult[], stopped: RunStatus | undefined): RunStatus {
  if (stopped) return stopped;
  return migrations.every((m) => m.status === 'succeeded') ? 'completed' : 'completed_with_errors';
}

export class MigrationOrchestrator {
  private readonly logger: Logger;

  constructor(
    private readonly source: DatabaseConnection,
    private readonly target: DatabaseConnection,
    private readonly registry: TransformRegistry,
    private readonly options: EngineOptions = {}
  ) {
    this.logger = options.logger ?? new Logger({ level: 'silent' });
  }

  /**
   * Plan every migration without touching either database
   * @throws ConfigError on the first invalid migration
   */
  plan(migrations: readonly MigrationSpec[]): MigrationPlan[] {
    const names = new Set<string>();
    return migrations.map((spec) => {
      this.checkUnique(spec, names);
      return planMigration(spec, this.registry, this.dialects, this.options);
    });
  }

  async run(migrations: readonly MigrationSpec[]): Promise<MigrationReport> {
    const runId = randomUUID();
    const startedAt = new Date();
    const results: MigrationResult[] = [];
    const logger = this.logger.child({ runId });
    let stopped: RunStatus | undefined;

    logger.info('Run started', { migrations: migrations.length });

    let engine: ResolvedEngineOptions | undefined;
    const names = new Set<string>();

    for (const spec of migrations) {
      if (this.options.signal?.aborted) {
        stopped = 'cancelled';
        break;
      }

      let plan: MigrationPlan;
      try {
        engine ??= resolveEngineOptions(this.options);
        this.checkUnique(spec, names);
        plan = planMigration(spec, this.registry, this.dialects, this.options);
      } catch (err) {
        const error =
          err instanceof MigrationError
            ? err
            : new ConfigError({ code: 'INVALID_OPTIONS', message: errorMessage(err), migration: spec.name, cause: err });
        logger.error('Migration rejected', { migration: spec.name, error: error.message });
        results.push(failedResult(spec, error));
        stopped = 'failed';
        break;
      }

      const outcome = await runMigration(plan, {
        source: this.source,
        target: this.target,
        options: engine,
        signal: this.options.signal,
        logger,
        onProgress: this.options.onProgress,
      });
      results.push(outcome.result);

      if (outcome.fatal) {
        stopped = 'failed';
        break;
      }
      if (outcome.result.status === 'cancelled') {
        stopped = 'cancelled';
        break;
      }
    }

    const completedAt = new Date();
    const report: MigrationReport = {
      runId,
      status: runStatus(results, stopped),
      startedAt,
      completedAt,
      durationMs: completedAt.getTime() - startedAt.getTime(),
      migrations: results,
    };

    logger.info('Run finished', { status: report.status, durationMs: report.durationMs });
    return report;
  }

  private get dialects() {
    return { source: this.source.dialect, target: this.target.dialect };
  }

  private checkUnique(spec: MigrationSpec, names: Set<string>): void {
    if (names.has(spec.name)) {
      throw new ConfigError({
        code: 'INVALID_OPTIONS',
        message: `Migration name "${spec.name}" is declared more than once.`,
        migration: spec.name,
        suggestion: 'Give every migration a unique name.',
      });
    }
    names.add(spec.name);
  }
}

/**
 * Run migrations in order from `source` into `target`
 */
export async function migrate(
  source: DatabaseConnection,
  target: DatabaseConnection,
  migrations: readonly MigrationSpec[],
  registry: TransformRegistry = {},
  options: EngineOptions = {}
): Promise<MigrationReport> {
  return new MigrationOrchestrator(source, target, registry, options).run(migrations);
}
