export * from './value.js';
export * from './migration.js';
export * from './report.js';
