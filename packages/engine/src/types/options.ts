/**
 * Run options and progress events
 */

import type { ErrorEntry, Logger, MigrationResult } from '@rowshift/core';

export interface EngineOptions {
  /** Rows per source page (default: 1000) */
  pageSize?: number;
  /** Rows per target transaction (default: 500) */
  batchSize?: number;
  /** Pages read ahead of the transform/write stage (default: 1, max: 2) */
  prefetchPages?: number;
  /** Fixed delay before the single page or batch retry (default: 250ms) */
  retryDelayMs?: number;
  /**
   * Abort a migration once failed/attempted transforms exceed this rate.
   * Unset means best effort.
   */
  maxTransformFailureRate?: number;
  /** Same for written rows */
  maxWriteFailureRate?: number;
  /** Checked at page and batch boundaries */
  signal?: AbortSignal;
  logger?: Logger;
  onProgress?: (event: ProgressEvent) => void;
}

export type ProgressEvent =
  | { type: 'migration_started'; migration: string; targetTable: string }
  | { type: 'page_read'; migration: string; page: number; rows: number }
  | { type: 'batch_committed'; migration: string; batchIndex: number; rows: number }
  | { type: 'batch_failed'; migration: string; batchIndex: number; rows: number; error: ErrorEntry }
  | { type: 'migration_finished'; migration: string; result: MigrationResult };

export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_BATCH_SIZE = 500;
export const DEFAULT_PREFETCH_PAGES = 1;
export const MAX_PREFETCH_PAGES = 2;
export const DEFAULT_RETRY_DELAY_MS = 250;
