/**
 * @rowshift/core
 *
 * Shared types, dialects, errors and logging for rowshift
 */

// Types
export * from './types/index.js';

// Interfaces
export * from './interfaces/index.js';

// Dialects
export * from './dialects/index.js';

// Errors
export * from './errors/index.js';

// Validation schemas
export * from './validation/index.js';

// Logging
export * from './logging/index.js';

// Utilities
export * from './utils/index.js';
