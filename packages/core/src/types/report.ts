/**
 * Migration report types
 */

export type ErrorStage = 'config' | 'connection' | 'query' | 'transform' | 'write' | 'threshold';

export interface RowIdentifier {
  /** Qualified source column used to identify the row */
  column: string;
  /** Its value (null when absent) */
  value: unknown;
}

export interface ErrorEntry {
  stage: ErrorStage;
  code: string;
  message: string;
  rowIdentifier?: RowIdentifier;
  /** Zero-based index of the batch, for write failures */
  batchIndex?: number;
}

export type MigrationStatus =
  | 'succeeded'
  | 'completed_with_errors'
  | 'aborted'
  | 'failed'
  | 'cancelled';

export interface MigrationResult {
  name: string;
  targetTable: string;
  status: MigrationStatus;
  rowsRead: number;
  rowsTransformed: number;
  rowsSkipped: number;
  rowsFailedTransform: number;
  rowsWritten: number;
  rowsFailedWrite: number;
  batchesCommitted: number;
  batchesFailed: number;
  errors: ErrorEntry[];
  durationMs: number;
}

export type RunStatus = 'completed' | 'completed_with_errors' | 'failed' | 'cancelled';

export interface MigrationReport {
  runId: string;
  status: RunStatus;
  startedAt: Date;
  completedAt: Date;
  durationMs: number;
  migrations: MigrationResult[];
}
