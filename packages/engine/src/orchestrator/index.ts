export { MigrationOrchestrator, migrate } from './migration-orchestrator.js';
export { MigrationRunner, runMigration } from './migration-runner.js';
export type { RunContext, RunOutcome } from './migration-runner.js';
export { planMigration, resolveEngineOptions, engineOptionsSchema } from './planner.js';
export type { ResolvedEngineOptions, PlanDialects } from './planner.js';
export { BoundedQueue, pump } from './bounded-queue.js';
