/**
 * BatchWriter
 *
 * Accumulates target rows and commits them one transaction per batch,
 * in push order. A failed batch is rolled back and retried once; after
 * that its rows are reported and the writer moves on. Connection failures
 * are not retried: the interrupted batch goes back to the buffer and the
 * error propagates to the caller.
 */

import {
  ConnectionError,
  WriteError,
  errorMessage,
  toDriverValue,
  type DatabaseConnection,
  type Logger,
  type Row,
  type RowIdentifier,
  type WriteMode,
} from '@rowshift/core';
import { singleRetry, withRetries } from '../retry.js';

export interface PendingRow {
  row: Row;
  /** Source key, for error entries */
  identifier?: RowIdentifier;
}

export interface BatchWriterOptions {
  migration?: string;
  targetTable: string;
  /** Insert column order */
  columns: readonly string[];
  batchSize: number;
  writeMode?: WriteMode;
  conflictColumns?: readonly string[];
  retryDelayMs: number;
  logger?: Logger;
}

export type BatchOutcome =
  | { status: 'committed'; batchIndex: number; rows: number; attempts: number }
  | {
      status: 'failed';
      batchIndex: number;
      rows: number;
      attempts: number;
      error: WriteError;
      identifiers: Array<RowIdentifier | undefined>;
    };

export class BatchWriter {
  private buffer: PendingRow[] = [];
  private nextBatchIndex = 0;
  private fullBatchSql?: string;

  constructor(
    private readonly connection: DatabaseConnection,
    private readonly options: BatchWriterOptions
  ) {
    if (!Number.isInteger(options.batchSize) || options.batchSize < 1) {
      throw new Error(`batchSize must be >= 1 (got ${options.batchSize})`);
    }
  }

  /** Rows waiting for the next commit */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Take every buffered row without writing it
   */
  drain(): PendingRow[] {
    const rows = this.buffer;
    this.buffer = [];
    return rows;
  }

  /**
   * Buffer a row, committing when the batch is full
   * @returns the batch outcome when a commit happened
   */
  async push(row: PendingRow): Promise<BatchOutcome | undefined> {
    this.buffer.push(row);
    if (this.buffer.length >= this.options.batchSize) {
      return this.flush();
    }
    return undefined;
  }

  /**
   * Commit whatever is buffered
   * @throws ConnectionError when the target connection is unusable
   */
  async flush(): Promise<BatchOutcome | undefined> {
    if (this.buffer.length === 0) return undefined;

    const batch = this.buffer;
    this.buffer = [];
    return this.commit(batch, this.nextBatchIndex++);
  }

  /**
   * Write a whole row sequence, returning per-batch outcomes in commit order
   */
  async write(rows: Iterable<PendingRow> | AsyncIterable<PendingRow>): Promise<BatchOutcome[]> {
    const outcomes: BatchOutcome[] = [];
    for await (const row of rows) {
      const outcome = await this.push(row);
      if (outcome) outcomes.push(outcome);
    }
    const last = await this.flush();
    if (last) outcomes.push(last);
    return outcomes;
  }

  private statementFor(rowCount: number): string {
    const { targetTable, columns, writeMode, conflictColumns } = this.options;
    const build = () =>
      this.connection.dialect.insertStatement(targetTable, columns, rowCount, {
        mode: writeMode,
        conflictColumns: conflictColumns ? [...conflictColumns] : undefined,
      });

    if (rowCount !== this.options.batchSize) return build();
    this.fullBatchSql ??= build();
    return this.fullBatchSql;
  }

  private async commit(batch: PendingRow[], batchIndex: number): Promise<BatchOutcome> {
    const { columns, logger } = this.options;
    const sql = this.statementFor(batch.length);
    const params: unknown[] = [];
    for (const { row } of batch) {
      for (const column of columns) {
        params.push(toDriverValue(row.get(column)));
      }
    }

    let attempts = 0;
    try {
      await withRetries(
        async () => {
          attempts++;
          await this.attempt(sql, params);
        },
        singleRetry(this.options.retryDelayMs),
        (err) => !(err instanceof ConnectionError),
        (err) =>
          logger?.warn('Batch write failed, retrying', { batchIndex, error: errorMessage(err) })
      );
    } catch (err) {
      if (err instanceof ConnectionError) {
        this.buffer = batch.concat(this.buffer);
        throw err;
      }

      const error =
        err instanceof WriteError
          ? err
          : new WriteError({ message: errorMessage(err), migration: this.options.migration, cause: err });
      logger?.warn('Batch write failed', { batchIndex, rows: batch.length, error: error.message });

      return {
        status: 'failed',
        batchIndex,
        rows: batch.length,
        attempts,
        error,
        identifiers: batch.map((r) => r.identifier),
      };
    }

    logger?.debug('Batch committed', { batchIndex, rows: batch.length });
    return { status: 'committed', batchIndex, rows: batch.length, attempts };
  }

  /** BEGIN, INSERT, COMMIT; ROLLBACK on any failure */
  private async attempt(sql: string, params: unknown[]): Promise<void> {
    const tx = await this.connection.begin();
    try {
      await tx.execute(sql, params);
      await tx.commit();
    } catch (err) {
      try {
        await tx.rollback();
      } catch (rollbackErr) {
        this.options.logger?.warn('Rollback failed', { error: errorMessage(rollbackErr) });
      }
      throw err;
    }
  }
}
