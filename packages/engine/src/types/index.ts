export type {
  PlannedJoin,
  OrderedJoinPlan,
  SourceColumn,
  ResolvedPagination,
  CompiledQuery,
  PageStatement,
  MigrationPlan,
} from './plan.js';
export type { EngineOptions, ProgressEvent } from './options.js';
export {
  DEFAULT_PAGE_SIZE,
  DEFAULT_BATCH_SIZE,
  DEFAULT_PREFETCH_PAGES,
  MAX_PREFETCH_PAGES,
  DEFAULT_RETRY_DELAY_MS,
} from './options.js';
