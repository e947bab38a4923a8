/**
 * Runs one planned migration: paged read, transform, batched write.
 *
 * The reader runs ahead of the transform/write stage through a bounded
 * queue. Rows keep their read order through every stage.
 */

import {
  ConnectionError,
  MigrationError,
  type Logger,
  errorMessage,
  wrapError,
  type DatabaseConnection,
  type ErrorEntry,
  type MigrationResult,
  type MigrationStatus,
  type Row,
} from '@rowshift/core';
import { readPages } from '../query/index.js';
import { TransformPipeline } from '../transform/index.js';
import { BatchWriter, type BatchOutcome } from '../writer/index.js';
import type { MigrationPlan, ProgressEvent } from '../types/index.js';
import { BoundedQueue, pump } from './bounded-queue.js';
import type { ResolvedEngineOptions } from './planner.js';

export interface RunContext {
  source: DatabaseConnection;
  target: DatabaseConnection;
  options: ResolvedEngineOptions;
  signal?: AbortSignal;
  logger: Logger;
  onProgress?: (event: ProgressEvent) => void;
}

export interface RunOutcome {
  result: MigrationResult;
  /** The connection is unusable; no further migration should run */
  fatal: boolean;
}

type Counters = Omit<MigrationResult, 'name' | 'targetTable' | 'status' | 'errors' | 'durationMs'>;

function entryFor(error: MigrationError): ErrorEntry {
  return { stage: error.stage, code: error.code, message: error.message };
}

/** failed / attempted, or 0 when nothing was attempted */
function failureRate(failed: number, succeeded: number): number {
  const attempted = failed + succeeded;
  return attempted === 0 ? 0 : failed / attempted;
}

export class MigrationRunner {
  private readonly counters: Counters = {
    rowsRead: 0,
    rowsTransformed: 0,
    rowsSkipped: 0,
    rowsFailedTransform: 0,
    rowsWritten: 0,
    rowsFailedWrite: 0,
    batchesCommitted: 0,
    batchesFailed: 0,
  };
  private readonly errors: ErrorEntry[] = [];
  private readonly logger: Logger;
  private stopStatus: MigrationStatus | undefined;
  private targetLost = false;

  constructor(
    private readonly plan: MigrationPlan,
    private readonly context: RunContext
  ) {
    this.logger = context.logger.child({ migration: plan.name });
  }

  async run(): Promise<RunOutcome> {
    const { plan, context, logger } = this;
    const startedAt = Date.now();
    let fatal = false;

    logger.info('Migration started', { targetTable: plan.targetTable });
    this.emit({ type: 'migration_started', migration: plan.name, targetTable: plan.targetTable });

    const pipeline = new TransformPipeline({
      migration: plan.name,
      mapping: plan.mapping,
      targetColumns: plan.targetColumns,
      transform: plan.transform,
      transformName: plan.transformName,
    });
    const writer = new BatchWriter(context.target, {
      migration: plan.name,
      targetTable: plan.targetTable,
      columns: plan.targetColumns,
      batchSize: plan.batchSize,
      writeMode: plan.writeMode,
      conflictColumns: plan.conflictColumns,
      retryDelayMs: context.options.retryDelayMs,
      logger,
    });

    const queue = new BoundedQueue<Row[]>(context.options.prefetchPages);
    const producing = pump(
      readPages(context.source, plan.query, {
        retryDelayMs: context.options.retryDelayMs,
        signal: context.signal,
        logger,
        migration: plan.name,
        onPage: (page, rows) => this.emit({ type: 'page_read', migration: plan.name, page, rows }),
      }),
      queue
    );

    try {
      try {
        await this.consume(queue, pipeline, writer);
      } catch (err) {
        if (err instanceof ConnectionError && this.targetLost) throw err;
        if (err instanceof ConnectionError) {
          // The target still takes the rows read before the source went away
          logger.error('Source connection failed', { error: err.message });
          this.errors.push(entryFor(err));
          fatal = true;
        } else {
          const error = wrapError(err, 'query', plan.name);
          logger.error('Source read failed', { error: error.message });
          this.errors.push(entryFor(error));
        }
        this.stopStatus = 'failed';
      }

      // The partial batch of an interrupted run still commits
      const last = await this.write(() => writer.flush());
      if (last) this.record(last);
    } catch (err) {
      const error = err instanceof ConnectionError ? err : wrapError(err, 'connection', plan.name);
      logger.error('Target connection failed', { error: error.message });
      this.dropUnwritten(writer, error);
      this.stopStatus = 'failed';
      fatal = true;
    } finally {
      queue.cancel();
      await producing;
    }

    if (!this.stopStatus && context.signal?.aborted) {
      this.stopStatus = 'cancelled';
    }

    const status: MigrationStatus =
      this.stopStatus ?? (this.errors.length > 0 ? 'completed_with_errors' : 'succeeded');
    const result: MigrationResult = {
      name: plan.name,
      targetTable: plan.targetTable,
      status,
      ...this.counters,
      errors: this.errors,
      durationMs: Date.now() - startedAt,
    };

    logger.log(status === 'succeeded' ? 'info' : 'warn', 'Migration finished', {
      status,
      rowsRead: result.rowsRead,
      rowsWritten: result.rowsWritten,
      errors: result.errors.length,
    });
    this.emit({ type: 'migration_finished', migration: plan.name, result });

    return { result, fatal };
  }

  private async consume(
    queue: BoundedQueue<Row[]>,
    pipeline: TransformPipeline,
    writer: BatchWriter
  ): Promise<void> {
    for await (const page of queue) {
      for (const source of page) {
        this.counters.rowsRead++;
        const outcome = pipeline.apply(source);

        if (outcome.status === 'skipped') {
          this.counters.rowsSkipped++;
          continue;
        }

        const identifier = pipeline.identify(source);
        if (outcome.status === 'failed') {
          this.counters.rowsFailedTransform++;
          this.errors.push({ ...entryFor(outcome.error), rowIdentifier: identifier });
          this.logger.warn('Row failed to transform', { row: identifier, error: outcome.error.message });
          continue;
        }

        this.counters.rowsTransformed++;
        const batch = await this.write(() => writer.push({ row: outcome.row, identifier }));
        if (batch) {
          this.record(batch);
          if (this.shouldStop()) return;
        }
      }

      if (this.shouldStop()) return;
    }
  }

  /** Run a writer call, remembering whether the target connection failed */
  private async write(op: () => Promise<BatchOutcome | undefined>): Promise<BatchOutcome | undefined> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof ConnectionError) this.targetLost = true;
      throw err;
    }
  }

  /** Rows still buffered when the target is lost count as failed writes, one entry each */
  private dropUnwritten(writer: BatchWriter, error: MigrationError): void {
    const dropped = writer.drain();
    const entry = entryFor(error);
    this.counters.rowsFailedWrite += dropped.length;

    if (dropped.length === 0) {
      this.errors.push(entry);
      return;
    }
    for (const { identifier } of dropped) {
      this.errors.push({ ...entry, rowIdentifier: identifier });
    }
  }

  private record(batch: BatchOutcome): void {
    const migration = this.plan.name;

    if (batch.status === 'committed') {
      this.counters.rowsWritten += batch.rows;
      this.counters.batchesCommitted++;
      this.emit({ type: 'batch_committed', migration, batchIndex: batch.batchIndex, rows: batch.rows });
      return;
    }

    this.counters.rowsFailedWrite += batch.rows;
    this.counters.batchesFailed++;
    const entry = entryFor(batch.error);
    for (const rowIdentifier of batch.identifiers) {
      this.errors.push({ ...entry, rowIdentifier, batchIndex: batch.batchIndex });
    }
    this.emit({ type: 'batch_failed', migration, batchIndex: batch.batchIndex, rows: batch.rows, error: entry });
  }

  /** Cancellation and failure thresholds, checked at batch and page boundaries */
  private shouldStop(): boolean {
    if (this.context.signal?.aborted) {
      this.stopStatus = 'cancelled';
      this.logger.info('Migration cancelled');
      return true;
    }

    const { maxTransformFailureRate, maxWriteFailureRate } = this.context.options;
    const c = this.counters;
    const checks: Array<[string, number | undefined, number]> = [
      ['transform', maxTransformFailureRate, failureRate(c.rowsFailedTransform, c.rowsTransformed)],
      ['write', maxWriteFailureRate, failureRate(c.rowsFailedWrite, c.rowsWritten)],
    ];

    for (const [stage, limit, rate] of checks) {
      if (limit !== undefined && rate > limit) {
        const message = `${stage} failure rate ${(rate * 100).toFixed(1)}% exceeds the limit of ${(limit * 100).toFixed(1)}%.`;
        this.errors.push({ stage: 'threshold', code: 'FAILURE_THRESHOLD_EXCEEDED', message });
        this.logger.error('Migration aborted', { reason: message });
        this.stopStatus = 'aborted';
        return true;
      }
    }

    return false;
  }

  private emit(event: ProgressEvent): void {
    try {
      this.context.onProgress?.(event);
    } catch (err) {
      this.logger.warn('Progress callback failed', { error: errorMessage(err) });
    }
  }
}

export async function runMigration(plan: MigrationPlan, context: RunContext): Promise<RunOutcome> {
  return new MigrationRunner(plan, context).run();
}
