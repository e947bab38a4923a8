/**
 * @rowshift/engine
 *
 * Join planning, paged reads, transforms and batched writes
 */

// Types
export * from './types/index.js';

// Join graph
export * from './join-graph/index.js';

// Query compilation and paged reads
export * from './query/index.js';

// Transforms
export * from './transform/index.js';

// Batched writes
export * from './writer/index.js';

// Orchestration
export * from './orchestrator/index.js';

// Formatters
export * from './formatters/index.js';

// Retry
export { withRetries, singleRetry, sleep } from './retry.js';
export type { RetryConfig, RetryContext } from './retry.js';
