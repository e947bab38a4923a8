export { BatchWriter } from './batch-writer.js';
export type { BatchOutcome, BatchWriterOptions, PendingRow } from './batch-writer.js';
